import type { Duplex } from "node:stream";

export type ByteCount = { inBytes: number; outBytes: number };

function pipeWithCount(src: Duplex, dst: Duplex, onBytes: (n: number) => void): void {
  src.on("data", (chunk: Buffer | string) => {
    onBytes(Buffer.isBuffer(chunk) ? chunk.length : Buffer.byteLength(chunk));
  });
  src.pipe(dst);
}

// Pipes client<->server both ways; the returned counter keeps updating until both sides close.
export function tunnel(client: Duplex, server: Duplex): ByteCount {
  const count: ByteCount = { inBytes: 0, outBytes: 0 };
  pipeWithCount(client, server, (n) => { count.outBytes += n; });
  pipeWithCount(server, client, (n) => { count.inBytes += n; });
  return count;
}
