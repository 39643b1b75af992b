import type { RawData } from 'ws';

export type FrameKind = 'binary' | 'text';

/** Unidad recibida por el socket. Inmutable una vez creada. */
export type Frame = {
  readonly payload: Buffer | string;
  readonly kind: FrameKind;
  readonly size: number;
  readonly receivedAt: number;
};

function toBuffer(data: RawData): Buffer {
  if (Buffer.isBuffer(data)) {
    return data;
  }
  if (Array.isArray(data)) {
    return Buffer.concat(data);
  }
  return Buffer.from(data);
}

export function toFrame(data: RawData, isBinary: boolean, receivedAt: number = Date.now()): Frame {
  const buffer = toBuffer(data);
  if (isBinary) {
    const frame: Frame = { payload: buffer, kind: 'binary', size: buffer.byteLength, receivedAt };
    return Object.freeze(frame);
  }

  const text = buffer.toString('utf8');
  const frame: Frame = { payload: text, kind: 'text', size: text.length, receivedAt };
  return Object.freeze(frame);
}
