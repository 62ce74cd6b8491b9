import { TextDecoder } from 'node:util';

import { SIZE_LIMITS } from '../config/constants.js';

const UTF8_ENCODING = 'utf-8';

const BOM_SIGNATURES: readonly {
  bytes: readonly number[];
  encoding: string;
}[] = [
  { bytes: [0xef, 0xbb, 0xbf], encoding: 'utf-8' },
  { bytes: [0xff, 0xfe], encoding: 'utf-16le' },
  { bytes: [0xfe, 0xff], encoding: 'utf-16be' },
];

function startsWithBytes(
  buffer: Uint8Array,
  signature: readonly number[]
): boolean {
  if (buffer.length < signature.length) return false;
  return signature.every((byte, index) => buffer[index] === byte);
}

function detectBomEncoding(buffer: Uint8Array): string | undefined {
  for (const { bytes, encoding } of BOM_SIGNATURES) {
    if (startsWithBytes(buffer, bytes)) return encoding;
  }
  return undefined;
}

export function getCharsetFromContentType(
  contentType: string | undefined
): string | undefined {
  if (!contentType) return undefined;
  const match = /charset=([^;]+)/i.exec(contentType);
  const charsetGroup = match?.[1];
  if (!charsetGroup) return undefined;

  let charset = charsetGroup.trim();
  if (charset.startsWith('"') && charset.endsWith('"')) {
    charset = charset.slice(1, -1);
  }
  return charset.trim().toLowerCase() || undefined;
}

function readQuotedValue(input: string, startIndex: number): string {
  const first = input[startIndex];
  if (!first) return '';

  if (first === '"' || first === "'") {
    const end = input.indexOf(first, startIndex + 1);
    return end === -1 ? '' : input.slice(startIndex + 1, end).trim();
  }

  const tail = input.slice(startIndex);
  const stop = tail.search(/[\s/>;"']/);
  return (stop === -1 ? tail : tail.slice(0, stop)).trim();
}

/**
 * Charset declared inside the markup (`<meta charset>`, the http-equiv
 * content-type form, or an XML declaration), read from the first bytes.
 */
export function sniffDeclaredCharset(buffer: Uint8Array): string | undefined {
  const scanSize = Math.min(buffer.length, SIZE_LIMITS.CHARSET_SCAN_BYTES);
  if (scanSize === 0) return undefined;

  const head = Buffer.from(buffer.buffer, buffer.byteOffset, scanSize).toString(
    'latin1'
  );
  const lower = head.toLowerCase();

  for (const token of ['charset=', 'encoding=']) {
    const index = lower.indexOf(token);
    if (index === -1) continue;
    const value = readQuotedValue(head, index + token.length);
    if (value) return value.toLowerCase();
  }
  return undefined;
}

function createDecoder(encoding: string | undefined): TextDecoder | null {
  if (!encoding) return null;
  try {
    return new TextDecoder(encoding);
  } catch {
    return null;
  }
}

/**
 * Decodes a fetched body. Tries the byte-order mark, then the declared
 * charset, then the charset sniffed from the markup, and finally UTF-8 with
 * replacement characters. Never throws on malformed bytes.
 */
export function decodeHtml(
  body: Uint8Array | string,
  declaredCharset?: string
): string {
  if (typeof body === 'string') return body;

  const decoder =
    createDecoder(detectBomEncoding(body)) ??
    createDecoder(declaredCharset) ??
    createDecoder(sniffDeclaredCharset(body)) ??
    new TextDecoder(UTF8_ENCODING);

  return decoder.decode(body);
}
