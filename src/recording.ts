const LINE_FEED = 0x0a;
const CARRIAGE_RETURN = 0x0d;

export type RecordingPayload = {
  audio: Buffer;
  headerLines: string[];
  /** False when no delimiter was found and `audio` is the whole body. */
  framed: boolean;
};

export function resolveBoundary(contentType: string | undefined): string | undefined {
  const match = contentType?.match(/boundary=(?:"([^"]+)"|([^;\s]+))/i);
  if (!match) {
    return undefined;
  }
  return match[1] ?? match[2];
}

function lineEnd(body: Buffer, from: number): number {
  const index = body.indexOf(LINE_FEED, from);
  return index < 0 ? body.length : index + 1;
}

function readLine(body: Buffer, from: number, to: number): string {
  return body.subarray(from, to).toString("latin1").replace(/\r?\n$/, "");
}

/**
 * Extracts the first part of a multipart recording upload. Without an
 * explicit boundary the first body line is taken as the delimiter. Framing
 * problems degrade to a best-effort result instead of failing.
 */
export function parseRecordingPayload(body: Buffer, boundary?: string): RecordingPayload {
  const delimiter = boundary
    ? `--${boundary}`
    : readLine(body, 0, lineEnd(body, 0)).trimEnd();
  const start = delimiter.length > 0 ? body.indexOf(delimiter) : -1;
  if (start < 0) {
    return { audio: body, headerLines: [], framed: false };
  }

  let cursor = lineEnd(body, start + delimiter.length);
  const headerLines: string[] = [];
  let headersDone = false;
  while (cursor < body.length) {
    const next = lineEnd(body, cursor);
    const line = readLine(body, cursor, next);
    cursor = next;
    if (line.trim().length === 0) {
      headersDone = true;
      break;
    }
    headerLines.push(line);
  }

  if (!headersDone) {
    return { audio: Buffer.alloc(0), headerLines, framed: true };
  }

  if (body.indexOf(delimiter, cursor) === cursor) {
    return { audio: Buffer.alloc(0), headerLines, framed: true };
  }

  const closing = body.indexOf(`\n${delimiter}`, cursor);
  let end = closing < 0 ? body.length : closing;
  if (closing >= 0 && end > cursor && body[end - 1] === CARRIAGE_RETURN) {
    end -= 1;
  }

  return {
    audio: body.subarray(cursor, end),
    headerLines,
    framed: true,
  };
}
