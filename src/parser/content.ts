import type { DecodedFrame } from '../codec/frame-codec.js';

type Json = Record<string, unknown>;

const isObject = (value: unknown): value is Json =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

const child = (value: unknown, key: string): Json | undefined => {
  if (!isObject(value)) {
    return undefined;
  }
  const next = value[key];
  return isObject(next) ? next : undefined;
};

const text = (value: Json | undefined, key: string): string => {
  const raw = value?.[key];
  return typeof raw === 'string' ? raw : '';
};

export function newElement(decoded: DecodedFrame): Json | undefined {
  return child(child(decoded, 'delta'), 'newElement');
}

export function markdownBody(decoded: DecodedFrame): string {
  return text(child(newElement(decoded), 'markdown'), 'body');
}

export function metricLabel(decoded: DecodedFrame): string {
  return text(child(newElement(decoded), 'metric'), 'label');
}

export function metricBody(decoded: DecodedFrame): string {
  return text(child(newElement(decoded), 'metric'), 'body');
}

export function plotlySpec(decoded: DecodedFrame): string {
  return text(child(newElement(decoded), 'plotlyChart'), 'spec');
}

export function isMarkdown(decoded: DecodedFrame): boolean {
  return child(newElement(decoded), 'markdown') !== undefined;
}

export function hasArrowDataFrame(decoded: DecodedFrame): boolean {
  return child(newElement(decoded), 'arrowDataFrame') !== undefined;
}

export function arrowColumns(decoded: DecodedFrame): string {
  const columns = child(newElement(decoded), 'arrowDataFrame')?.columns;
  if (columns === undefined || columns === null) {
    return '';
  }
  return typeof columns === 'string' ? columns : JSON.stringify(columns);
}

/**
 * Texto sobre el que se buscan las firmas: cuerpo markdown, etiqueta y cuerpo
 * de la métrica, spec de plotly y columnas del data frame, en ese orden.
 */
export function elementContent(decoded: DecodedFrame): string {
  const element = newElement(decoded);
  if (!element) {
    return '';
  }

  const parts: string[] = [];
  if (isObject(element.markdown)) {
    parts.push(markdownBody(decoded));
  }
  if (isObject(element.metric)) {
    parts.push(metricLabel(decoded), metricBody(decoded));
  }
  if (isObject(element.plotlyChart)) {
    parts.push(plotlySpec(decoded));
  }
  if (isObject(element.arrowDataFrame)) {
    parts.push(arrowColumns(decoded));
  }
  return parts.join(' ');
}

export function deltaPath(decoded: DecodedFrame): number[] {
  const raw = child(decoded, 'metadata')?.deltaPath;
  if (!Array.isArray(raw)) {
    return [];
  }
  return raw.map((segment) => Number(segment)).filter((segment) => Number.isFinite(segment));
}

export function scriptFinished(decoded: DecodedFrame): string | undefined {
  const value = decoded.scriptFinished;
  if (value === undefined || value === null) {
    return undefined;
  }
  return String(value);
}
