import { isIP } from 'node:net';

export interface CapturedPacket {
  src: string;
  dst: string;
  length: number;
}

export type ParsedLine =
  | { type: 'packet'; packet: CapturedPacket }
  | { type: 'ignored' }
  | { type: 'malformed'; line: string };

const STATUS_LINES = [/^Capturing on /, /^Running as user /, /^\d+ packets? captured$/];
const LENGTH = /^[1-9]\d*$/;

/** First entry of a comma-separated field, if it is an IP literal. */
function parseAddress(field: string): string | null {
  const [first = ''] = field.split(',');
  return isIP(first) === 0 ? null : first;
}

/**
 * Parse one line of `tshark -T fields -e ip.src -e ip.dst -e frame.len`
 * output. Lines that do not match are reported, never thrown.
 */
export function parseCaptureLine(raw: string): ParsedLine {
  const line = raw.trim();
  if (line === '') return { type: 'ignored' };
  if (STATUS_LINES.some((pattern) => pattern.test(line))) return { type: 'ignored' };

  const fields = line.split(/\s+/);
  if (fields.length !== 3) return { type: 'malformed', line };

  const [srcField = '', dstField = '', lengthField = ''] = fields;
  const src = parseAddress(srcField);
  const dst = parseAddress(dstField);
  if (src === null || dst === null || !LENGTH.test(lengthField)) {
    return { type: 'malformed', line };
  }

  const length = Number(lengthField);
  if (!Number.isSafeInteger(length)) return { type: 'malformed', line };

  return { type: 'packet', packet: { src, dst, length } };
}
