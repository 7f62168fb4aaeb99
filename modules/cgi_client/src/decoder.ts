import { decodeError } from './cgiErrors.js';
import { ResponseHeaders } from './headers.js';

export interface DecodedResponse {
  status?: number;
  headers: ResponseHeaders;
  content: Buffer;
}

const LINE_FEED = 0x0a;
const STATUS_LINE_PREFIX = /^http/i;
const STATUS_CODE_PATTERN = /^\d+$/;

/**
 * Decodes the HTTP-style output of a CGI program.
 *
 * Lines are read up to the first blank line; whatever follows it is the
 * body, byte for byte. Output without a blank line has an empty body and
 * every line counts as a header. A leading line starting with `HTTP` is
 * the status line. Header names are lower-cased and repeated names
 * collect into a list.
 *
 * Throws a `DECODE` error for a header line without a colon or a status
 * line whose code is not an integer.
 */
export function decodeResponse(raw: Uint8Array): DecodedResponse {
  const buffer = Buffer.from(raw.buffer, raw.byteOffset, raw.byteLength);
  const lines: string[] = [];
  let content = Buffer.alloc(0);
  let offset = 0;

  while (offset < buffer.length) {
    const newline = buffer.indexOf(LINE_FEED, offset);
    const end = newline === -1 ? buffer.length : newline;
    const line = buffer.subarray(offset, end).toString('utf-8').trim();
    offset = newline === -1 ? buffer.length : newline + 1;

    if (line.length === 0) {
      content = Buffer.from(buffer.subarray(offset));
      break;
    }
    lines.push(line);
  }

  let status: number | undefined;
  if (lines.length > 0 && STATUS_LINE_PREFIX.test(lines[0])) {
    status = parseStatusLine(lines[0]);
    lines.shift();
  }

  const fields = lines.map(parseHeaderLine);
  return {
    status,
    headers: ResponseHeaders.from(fields),
    content
  };
}

export function parseStatusLine(line: string): number {
  const code = line.split(/\s+/)[1];
  if (code === undefined || !STATUS_CODE_PATTERN.test(code)) {
    throw decodeError(`Invalid status line: ${line}`);
  }
  return Number.parseInt(code, 10);
}

export function parseHeaderLine(line: string): [string, string] {
  const separatorIndex = line.indexOf(':');
  if (separatorIndex === -1) {
    throw decodeError(`Invalid header line: ${line}. Expected: Header-Name: value`);
  }

  const name = line.slice(0, separatorIndex).trim();
  if (name.length === 0) {
    throw decodeError(`Header line has no field name: ${line}`);
  }
  return [name.toLowerCase(), line.slice(separatorIndex + 1).trim()];
}
