import type { CallToolResult } from '@modelcontextprotocol/sdk/types.js';

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

export function isMcpToolResult(value: unknown): value is CallToolResult {
  if (!isRecord(value)) return false;
  const content = value.content;
  if (!Array.isArray(content)) return false;
  return content.every(
    (block: unknown) =>
      isRecord(block) &&
      typeof block.type === 'string' &&
      (block.type !== 'text' || typeof block.text === 'string'),
  );
}

export function toMcpToolResult(value: unknown): CallToolResult {
  if (isMcpToolResult(value)) return value;
  const text =
    typeof value === 'string'
      ? value
      : value === undefined
        ? 'undefined'
        : JSON.stringify(value, null, 2);
  return textResult(text);
}

export function textResult(text: string): CallToolResult {
  return {
    content: [
      {
        type: 'text',
        text,
      },
    ],
  };
}

/**
 * Tool-level failure the caller can correct; the message is the only content
 */
export function errorResult(message: string): CallToolResult {
  return {
    isError: true,
    content: [
      {
        type: 'text',
        text: message,
      },
    ],
  };
}
