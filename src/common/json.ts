import { MalformedResponseError, errorMessage } from './errors';

export type JsonShape = 'object' | 'array';

/**
 * Pull the JSON payload out of a model reply that may wrap it in prose or a
 * code fence: first opening bracket to the last matching closing bracket.
 */
export function extractJson(text: string, shape: JsonShape = 'object'): string {
  const fenceMatch = text.match(/```(?:json)?\s*\n([\s\S]*?)\n\s*```/i);
  const body = fenceMatch ? fenceMatch[1] : text;

  const [open, close] = shape === 'object' ? ['{', '}'] : ['[', ']'];
  const start = body.indexOf(open);
  const end = body.lastIndexOf(close);
  if (start === -1 || end <= start) {
    throw new MalformedResponseError(`No JSON ${shape} found in response`, text);
  }
  return body.slice(start, end + 1);
}

export function parseJsonResponse(text: string, shape: JsonShape = 'object'): unknown {
  const jsonText = extractJson(text, shape);
  try {
    return JSON.parse(jsonText);
  } catch (e) {
    throw new MalformedResponseError(`Invalid JSON ${shape}: ${errorMessage(e)}`, text);
  }
}
