// pattern: Functional Core

/**
 * Locating invocation payloads in free model text.
 */

export type CallTags = {
  openTag: string;
  closeTag: string;
};

const FENCED_BLOCK = /```[\w+-]*[^\S\n]*\n?([\s\S]*?)```/;
const PYTHON_BLOCK = /```python(.*?)```/gs;

/** Contents of every complete open/close tag pair, in order. */
export function extractTaggedBlocks(response: string, tags: CallTags): Array<string> {
  const blocks: Array<string> = [];
  let from = 0;
  for (;;) {
    const open = response.indexOf(tags.openTag, from);
    if (open < 0) break;
    const start = open + tags.openTag.length;
    const close = response.indexOf(tags.closeTag, start);
    if (close < 0) break;
    blocks.push(response.slice(start, close));
    from = close + tags.closeTag.length;
  }
  return blocks;
}

/**
 * JSON payloads of a response, by priority: tagged blocks, then the first
 * fenced block (single quotes read as double quotes), then a bare object.
 * Null means the response is plain text.
 */
export function extractCallPayloads(response: string, tags: CallTags): Array<string> | null {
  const tagged = extractTaggedBlocks(response, tags);
  if (tagged.length > 0) {
    return tagged;
  }

  const fenced = FENCED_BLOCK.exec(response);
  if (fenced) {
    return [(fenced[1] ?? '').replace(/'/g, '"')];
  }

  const trimmed = response.trim();
  if (trimmed.startsWith('{')) {
    return [trimmed];
  }

  return null;
}

/** Bodies of every ```python block, without the tag itself. */
export function extractPythonBlocks(response: string): Array<string> {
  return Array.from(response.matchAll(PYTHON_BLOCK), (match) => match[1] ?? '');
}
