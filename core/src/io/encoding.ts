/**
 * Encoding normalizer for template files.
 *
 * Strategy exports are usually UTF-8, but older ones come out of Windows
 * hosts in a single-byte code page. Everything after this module works on
 * decoded text only.
 */
import iconv from 'iconv-lite';

export interface DecodedTemplate {
  text: string;
  /** Encoding actually used to decode the bytes, lowercased */
  encoding: string;
  hadByteOrderMark: boolean;
}

/** Used when bytes are not valid UTF-8 and nothing else is declared */
export const FALLBACK_ENCODING = 'windows-1252';

const UTF8_BOM = [0xef, 0xbb, 0xbf];

export function decodeTemplateBytes(bytes: Uint8Array): DecodedTemplate {
  const hadByteOrderMark = UTF8_BOM.every((value, index) => bytes[index] === value);
  const body = hadByteOrderMark ? bytes.subarray(UTF8_BOM.length) : bytes;

  const declared = hadByteOrderMark ? undefined : sniffDeclaredEncoding(body);
  if (declared && !isUtf8Label(declared) && iconv.encodingExists(declared)) {
    return { text: decodeWith(body, declared), encoding: declared, hadByteOrderMark };
  }

  const utf8 = tryDecodeUtf8(body);
  if (utf8 !== undefined) {
    return { text: utf8, encoding: 'utf-8', hadByteOrderMark };
  }
  return {
    text: decodeWith(body, FALLBACK_ENCODING),
    encoding: FALLBACK_ENCODING,
    hadByteOrderMark,
  };
}

/**
 * Reads the `encoding` pseudo-attribute of the XML declaration. The
 * declaration itself is ASCII in every encoding we accept.
 */
export function sniffDeclaredEncoding(bytes: Uint8Array): string | undefined {
  const head = new TextDecoder('latin1').decode(bytes.subarray(0, 256));
  const match = /^<\?xml[^>]*?\sencoding\s*=\s*["']([A-Za-z0-9._:-]+)["']/.exec(head);
  return match?.[1]?.toLowerCase();
}

function isUtf8Label(label: string): boolean {
  return label === 'utf-8' || label === 'utf8';
}

// Not TextDecoder: some ICU builds map 0x80-0x9F of windows-1252 to C1 controls.
function decodeWith(bytes: Uint8Array, encoding: string): string {
  return iconv.decode(Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength), encoding);
}

function tryDecodeUtf8(bytes: Uint8Array): string | undefined {
  try {
    return new TextDecoder('utf-8', { fatal: true }).decode(bytes);
  } catch (error) {
    if (error instanceof TypeError) {
      return undefined;
    }
    throw error;
  }
}
