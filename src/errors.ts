/**
 * Errores de preparación: abortan la ejecución antes de abrir cualquier sesión.
 */
export class SetupError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'SetupError';
  }
}

export class CredentialsError extends SetupError {
  readonly missing: readonly string[];

  constructor(message: string, missing: readonly string[]) {
    super(message);
    this.name = 'CredentialsError';
    this.missing = missing;
  }
}

export class TemplateError extends SetupError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'TemplateError';
  }
}

/** Fallo al codificar o decodificar un frame; nunca es fatal para la ejecución. */
export class FrameCodecError extends Error {
  readonly schema: string;

  constructor(message: string, schema: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'FrameCodecError';
    this.schema = schema;
  }
}
