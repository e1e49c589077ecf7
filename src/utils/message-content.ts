import type { MessageContent } from '@langchain/core/messages';

/** Flattens a streamed message chunk to its text parts. */
export const messageContentToText = (content: MessageContent): string => {
  if (typeof content === 'string') return content;
  return content
    .map((part) => (part.type === 'text' && 'text' in part ? part.text : ''))
    .join('');
};
