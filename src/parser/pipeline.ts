import type { DecodedFrame } from '../codec/frame-codec.js';
import { SCRIPT_FINISHED_SUCCESSFULLY } from '../config.js';
import { classify, createClassifierState, type ClassifiedMessage, type ClassifierState } from './classifier.js';
import { scriptFinished } from './content.js';
import { extract } from './extractors.js';
import { emptyRecord, mergeRecord, type UserRecord } from './record.js';
import type { TagCounts } from './tags.js';

export type PipelineState = {
  readonly classifier: ClassifierState;
  readonly record: UserRecord;
  readonly tagCounts: TagCounts;
  readonly framesProcessed: number;
  /** Se observó la señal terminal de fin de script. */
  readonly complete: boolean;
};

export type FoldResult = {
  readonly state: PipelineState;
  readonly message: ClassifiedMessage;
};

export function createPipeline(): PipelineState {
  return {
    classifier: createClassifierState(),
    record: emptyRecord(),
    tagCounts: {},
    framesProcessed: 0,
    complete: false,
  };
}

export const isTerminalFrame = (decoded: DecodedFrame): boolean =>
  scriptFinished(decoded) === SCRIPT_FINISHED_SUCCESSFULLY;

/** Clasifica, extrae y fusiona un frame decodificado. */
export function foldFrame(state: PipelineState, decoded: DecodedFrame): FoldResult {
  const { message, state: classifier } = classify(decoded, state.classifier);
  const record = mergeRecord(state.record, extract(message.tag, decoded));
  const tagCounts: TagCounts = { ...state.tagCounts };
  tagCounts[message.tag] = (tagCounts[message.tag] ?? 0) + 1;

  return {
    message,
    state: {
      classifier,
      record,
      tagCounts,
      framesProcessed: state.framesProcessed + 1,
      complete: state.complete || isTerminalFrame(decoded),
    },
  };
}

/**
 * Reproduce una secuencia de frames ya decodificados (p. ej. un volcado de
 * depuración). Se detiene en la señal terminal igual que una ejecución en vivo.
 */
export function parseFrames(frames: Iterable<DecodedFrame>): PipelineState {
  let state = createPipeline();
  for (const decoded of frames) {
    state = foldFrame(state, decoded).state;
    if (state.complete) {
      break;
    }
  }
  return state;
}
