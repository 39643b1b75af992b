import { readFile } from 'node:fs/promises';

import { z } from 'zod';

import { TemplateError } from '../errors.js';

const ContextInfoSchema = z
  .object({
    timezone: z.string(),
    timezoneOffset: z.number().int(),
    locale: z.string(),
    url: z.string().url(),
    isEmbedded: z.boolean(),
    colorScheme: z.string(),
  })
  .passthrough();

export const RequestTemplateSchema = z
  .object({
    rerunScript: z
      .object({
        queryString: z.string().default(''),
        widgetStates: z.record(z.unknown()).default({}),
        pageScriptHash: z.string().default(''),
        pageName: z.string().min(1, 'Debe indicar pageName.'),
        contextInfo: ContextInfoSchema,
      })
      .passthrough(),
  })
  .passthrough();

export type RequestTemplate = z.infer<typeof RequestTemplateSchema>;

export const DEFAULT_QUERY_PARAMETER = 'user_address';

export function parseTemplate(value: unknown, source = 'plantilla'): RequestTemplate {
  const parsed = RequestTemplateSchema.safeParse(value);
  if (!parsed.success) {
    const detail = parsed.error.issues.map((issue) => `${issue.path.join('.') || '(raíz)'}: ${issue.message}`).join('; ');
    throw new TemplateError(`Plantilla de petición inválida (${source}): ${detail}`);
  }
  return parsed.data;
}

export async function loadTemplate(filePath: string): Promise<RequestTemplate> {
  let content: string;
  try {
    content = await readFile(filePath, 'utf8');
  } catch (error) {
    throw new TemplateError(`No se pudo leer la plantilla ${filePath}.`, { cause: error });
  }

  let value: unknown;
  try {
    value = JSON.parse(content);
  } catch (error) {
    throw new TemplateError(`La plantilla ${filePath} no es JSON válido.`, { cause: error });
  }
  return parseTemplate(value, filePath);
}

/** Copia la plantilla cambiando solo `rerunScript.queryString`. */
export function buildRequest(
  template: RequestTemplate,
  target: string,
  parameter: string = DEFAULT_QUERY_PARAMETER,
): RequestTemplate {
  const copy = structuredClone(template);
  copy.rerunScript.queryString = `${parameter}=${encodeURIComponent(target)}`;
  return copy;
}
