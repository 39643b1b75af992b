import path from 'node:path';

import protobuf from 'protobufjs';
import type { IConversionOptions, Root, Type } from 'protobufjs';

import { REQUEST_SCHEMA, RESPONSE_SCHEMA } from '../config.js';
import { FrameCodecError } from '../errors.js';
import type { Frame } from '../ws/frame.js';

export type DecodedFrame = Record<string, unknown>;

export interface FrameCodec {
  encode(request: Record<string, unknown>, schema?: string): Uint8Array;
  decode(bytes: Uint8Array, schema?: string): DecodedFrame;
}

const CONVERSION_OPTIONS: IConversionOptions = {
  longs: String,
  enums: String,
  bytes: String,
  json: true,
};

// Los .proto de Streamlit se importan entre sí como "streamlit/proto/X.proto".
const VENDOR_IMPORT_PREFIX = /^.*streamlit\/proto\//;

/** Codec protobuf sobre los esquemas BackMsg/ForwardMsg del servidor. */
export class ProtobufFrameCodec implements FrameCodec {
  private readonly root: Root;
  private readonly types = new Map<string, Type>();

  constructor(root: Root) {
    this.root = root;
  }

  static fromDirectory(protoDir: string, schemas: readonly string[] = [REQUEST_SCHEMA, RESPONSE_SCHEMA]): ProtobufFrameCodec {
    const root = new protobuf.Root();
    root.resolvePath = (_origin: string, target: string): string =>
      path.isAbsolute(target) ? target : path.join(protoDir, target.replace(VENDOR_IMPORT_PREFIX, ''));

    try {
      root.loadSync(schemas.map((schema) => path.join(protoDir, `${schema}.proto`)));
      root.resolveAll();
    } catch (error) {
      throw new FrameCodecError(
        `No se pudieron cargar los esquemas desde ${protoDir}: ${error instanceof Error ? error.message : String(error)}`,
        schemas.join(','),
        { cause: error },
      );
    }
    return new ProtobufFrameCodec(root);
  }

  static fromSource(source: string): ProtobufFrameCodec {
    return new ProtobufFrameCodec(protobuf.parse(source).root);
  }

  encode(request: Record<string, unknown>, schema: string = REQUEST_SCHEMA): Uint8Array {
    const type = this.lookup(schema);
    const problem = type.verify(request);
    if (problem) {
      throw new FrameCodecError(`Petición inválida para ${schema}: ${problem}`, schema);
    }
    try {
      return type.encode(type.fromObject(request)).finish();
    } catch (error) {
      throw new FrameCodecError(`Error al codificar ${schema}.`, schema, { cause: error });
    }
  }

  decode(bytes: Uint8Array, schema: string = RESPONSE_SCHEMA): DecodedFrame {
    const type = this.lookup(schema);
    try {
      const decoded: DecodedFrame = type.toObject(type.decode(bytes), CONVERSION_OPTIONS);
      return decoded;
    } catch (error) {
      throw new FrameCodecError(`Error al decodificar ${schema}.`, schema, { cause: error });
    }
  }

  decodeBase64(text: string, schema: string = RESPONSE_SCHEMA): DecodedFrame {
    return this.decode(Buffer.from(text.trim(), 'base64'), schema);
  }

  private lookup(schema: string): Type {
    const cached = this.types.get(schema);
    if (cached) {
      return cached;
    }
    try {
      const type = this.root.lookupType(schema);
      this.types.set(schema, type);
      return type;
    } catch (error) {
      throw new FrameCodecError(`Esquema desconocido: ${schema}`, schema, { cause: error });
    }
  }
}

const isRecord = (value: unknown): value is DecodedFrame =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

/**
 * Decodifica un frame recibido. Los frames de texto se interpretan como JSON
 * cuando contienen un objeto y, si no, se envuelven como `{ text }`.
 */
export function decodeFrame(codec: FrameCodec, frame: Frame, schema: string = RESPONSE_SCHEMA): DecodedFrame {
  if (typeof frame.payload !== 'string') {
    return codec.decode(frame.payload, schema);
  }

  try {
    const parsed: unknown = JSON.parse(frame.payload);
    if (isRecord(parsed)) {
      return parsed;
    }
  } catch {
    // no es JSON
  }
  return { text: frame.payload };
}
