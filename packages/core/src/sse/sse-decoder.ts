/**
 * Splits a byte stream into text lines, handling `\n` and `\r\n` endings and
 * multi-byte characters split across chunks. A trailing partial line is
 * yielded when the stream ends.
 */
export async function* readLines(
  chunks: AsyncIterable<Uint8Array>,
): AsyncGenerator<string> {
  const decoder = new TextDecoder();
  let buffer = '';

  for await (const chunk of chunks) {
    buffer += decoder.decode(chunk, { stream: true });

    let newline = buffer.indexOf('\n');
    while (newline !== -1) {
      const line = buffer.slice(0, newline);
      buffer = buffer.slice(newline + 1);
      yield line.endsWith('\r') ? line.slice(0, -1) : line;
      newline = buffer.indexOf('\n');
    }
  }

  buffer += decoder.decode();
  if (buffer.length > 0) {
    yield buffer.endsWith('\r') ? buffer.slice(0, -1) : buffer;
  }
}

export type SseLine =
  | { type: 'data'; value: unknown }
  | { type: 'invalid'; line: string; error: unknown };

/**
 * Yields the JSON payload of every `data:` line. Lines without the prefix
 * (comments, `event:`, blank separators) are ignored; a payload that fails to
 * parse is reported as `invalid` rather than ending the stream.
 */
export async function* decodeSseData(
  chunks: AsyncIterable<Uint8Array>,
): AsyncGenerator<SseLine> {
  for await (const line of readLines(chunks)) {
    if (!line.startsWith('data:')) {
      continue;
    }
    const payload = line.slice('data:'.length).trim();
    if (payload === '') {
      continue;
    }
    try {
      const value: unknown = JSON.parse(payload);
      yield { type: 'data', value };
    } catch (error) {
      yield { type: 'invalid', line, error };
    }
  }
}
