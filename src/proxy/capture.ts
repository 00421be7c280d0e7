export type BodyAccumulator = {
  totalBytes: number;
  capturedBytes: number;
  bufs: Buffer[];
  limit: number;
};

export type CapturedBody = {
  body: Buffer;
  bodyBytes: number;
  complete: boolean;
};

export function newBodyAccumulator(limit: number): BodyAccumulator {
  return { totalBytes: 0, capturedBytes: 0, bufs: [], limit: Math.max(0, limit) };
}

export function ingestBodyChunk(acc: BodyAccumulator, chunk: Buffer | string): void {
  const buf = Buffer.isBuffer(chunk) ? chunk : Buffer.from(chunk);
  acc.totalBytes += buf.length;
  const remaining = acc.limit - acc.capturedBytes;
  if (remaining <= 0) return;
  if (buf.length <= remaining) {
    acc.bufs.push(buf);
    acc.capturedBytes += buf.length;
    return;
  }
  acc.bufs.push(buf.subarray(0, remaining));
  acc.capturedBytes += remaining;
}

export function finishBodyCapture(acc: BodyAccumulator): CapturedBody {
  return {
    body: Buffer.concat(acc.bufs),
    bodyBytes: acc.totalBytes,
    complete: acc.totalBytes === acc.capturedBytes,
  };
}
