// src/lib/bufferUtils.ts

// exceljs hands back an ArrayBuffer-like; express wants a Node Buffer
export function toNodeBuffer(buf: Buffer | ArrayBuffer | ArrayBufferView): Buffer {
  if (Buffer.isBuffer(buf)) return buf;
  if (buf instanceof ArrayBuffer) return Buffer.from(new Uint8Array(buf));
  return Buffer.from(buf.buffer, buf.byteOffset, buf.byteLength);
}
