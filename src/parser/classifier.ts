import type { DecodedFrame } from '../codec/frame-codec.js';
import { deltaPath, elementContent, hasArrowDataFrame, isMarkdown } from './content.js';
import { RANK_TAGS, type Tag } from './tags.js';

export type ClassifiedMessage = {
  readonly tag: Tag;
  readonly frame: DecodedFrame;
  readonly path: readonly number[];
};

export type ClassifierState = {
  readonly lastTag: Tag | null;
  /** Posición (0–3) del próximo frame de la familia de rankings. */
  readonly rankIndex: number;
  readonly activeBetsTableSeen: boolean;
  readonly finishedBetsTableSeen: boolean;
};

export type Classification = {
  readonly message: ClassifiedMessage;
  readonly state: ClassifierState;
};

const TYPE_LABEL_MARKER = ':material/';

type Signature = {
  /** `rank` resuelve a la etiqueta de ranking que toque según `rankIndex`. */
  readonly tag: Tag | 'rank';
  readonly matches: (content: string) => boolean;
};

const includes =
  (...markers: string[]) =>
  (content: string): boolean =>
    markers.every((marker) => content.includes(marker));

// Orden relevante: gana la primera firma que coincide.
const SIGNATURES: readonly Signature[] = [
  { tag: 'typeLabel', matches: includes(TYPE_LABEL_MARKER) },
  { tag: 'totalPositions', matches: includes('>Total Positions<') },
  { tag: 'activeSince', matches: includes('>Active Since<') },
  {
    tag: 'currentBalance',
    matches: (content) => content.includes('Current Balance\n') || content.includes('>Current Balance<'),
  },
  { tag: 'profileLink', matches: includes('<a href="https://polymarket.com/profile/') },
  { tag: 'rank', matches: includes('>Rank: ') },
  { tag: 'smartScoreSummary', matches: includes('User Smart Score:') },
  { tag: 'historicalPnlChart', matches: includes('Historical PnL') },
  { tag: 'sharpeRatio', matches: includes('Sharpe Ratio:') },
  { tag: 'tradedVolume30d', matches: includes('Traded USD Volume (Last 30d, daily)') },
  { tag: 'activeBetsSummary', matches: includes('Active Bets', 'PnL:') },
  { tag: 'finishedBetsSummary', matches: includes('Finished Bets', 'PnL:') },
  { tag: 'bestTrade', matches: includes('Best trade (ROI):') },
  { tag: 'worstTrade', matches: includes('Worst trade (ROI):') },
  { tag: 'roiDistribution', matches: includes('Distribution of ROI weighted by invested capital') },
  { tag: 'mostTradedCategories', matches: includes('Markets traded:') },
  { tag: 'smartScoreByCategory', matches: includes('Smart Score: %{r:.2f}') },
  { tag: 'winRateByCategory', matches: includes('Win Rate: %{r:.2%}') },
  {
    tag: 'recentTradesTable',
    matches: includes('"timestamp": {"label": "Timestamp"', '"question": {"label": "Question"'),
  },
  { tag: 'priceBuckets', matches: includes('Where This Trader Bets Most') },
];

export function createClassifierState(): ClassifierState {
  return {
    lastTag: null,
    rankIndex: 0,
    activeBetsTableSeen: false,
    finishedBetsTableSeen: false,
  };
}

/**
 * Etiqueta un frame decodificado. Función pura: el mismo frame con el mismo
 * estado produce siempre la misma etiqueta y el mismo estado siguiente.
 */
export function classify(frame: DecodedFrame, state: ClassifierState): Classification {
  let next: ClassifierState = state;
  const finish = (tag: Tag): Classification => ({
    message: { tag, frame, path: deltaPath(frame) },
    state: { ...next, lastTag: tag },
  });

  if (frame.scriptFinished !== undefined && frame.scriptFinished !== null) {
    return finish('streamComplete');
  }

  const content = elementContent(frame);

  if (state.lastTag === 'typeLabel' && isMarkdown(frame) && !content.includes(TYPE_LABEL_MARKER)) {
    return finish('typeLabelDescription');
  }

  // La tabla de detalle llega justo después de su resumen, una sola vez por categoría.
  if (state.lastTag === 'activeBetsSummary' && !state.activeBetsTableSeen) {
    next = { ...next, activeBetsTableSeen: true };
    if (hasArrowDataFrame(frame)) {
      return finish('activeBetsTable');
    }
  }
  if (state.lastTag === 'finishedBetsSummary' && !state.finishedBetsTableSeen) {
    next = { ...next, finishedBetsTableSeen: true };
    if (hasArrowDataFrame(frame)) {
      return finish('finishedBetsTable');
    }
  }

  const signature = SIGNATURES.find((candidate) => candidate.matches(content));
  if (!signature) {
    return finish('unclassified');
  }
  if (signature.tag === 'rank') {
    const tag = RANK_TAGS[next.rankIndex % RANK_TAGS.length];
    next = { ...next, rankIndex: (next.rankIndex + 1) % RANK_TAGS.length };
    return finish(tag);
  }
  return finish(signature.tag);
}

export function classifySequence(frames: Iterable<DecodedFrame>): ClassifiedMessage[] {
  const messages: ClassifiedMessage[] = [];
  let state = createClassifierState();
  for (const frame of frames) {
    const result = classify(frame, state);
    messages.push(result.message);
    state = result.state;
  }
  return messages;
}
