export class InvalidDocumentNameError extends Error {
  constructor(readonly filename: string) {
    super(`Invalid document name: "${filename}"`);
    this.name = InvalidDocumentNameError.name;
  }
}
