import { DateTime } from 'luxon';

import type { DecodedFrame } from '../codec/frame-codec.js';
import { markdownBody, metricBody, plotlySpec } from './content.js';
import type { CategoryMetrics, ExtractedFields } from './record.js';
import type { RankTag, Tag } from './tags.js';

type Extractor = (frame: DecodedFrame) => ExtractedFields;

type MutableFields = { -readonly [K in keyof ExtractedFields]: ExtractedFields[K] };

const NONE: ExtractedFields = Object.freeze({});

const parseAmount = (raw: string | undefined): number | undefined => {
  if (raw === undefined) {
    return undefined;
  }
  const value = Number(raw.replace(/,/g, ''));
  return Number.isFinite(value) ? value : undefined;
};

const firstGroup = (pattern: RegExp, source: string): string | undefined => pattern.exec(source)?.[1];

const isObject = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

/** Primera traza del spec de plotly embebido (un JSON dentro del frame). */
function firstTrace(frame: DecodedFrame): Record<string, unknown> | undefined {
  const spec = plotlySpec(frame);
  if (!spec) {
    return undefined;
  }
  try {
    const parsed: unknown = JSON.parse(spec);
    if (!isObject(parsed) || !Array.isArray(parsed.data)) {
      return undefined;
    }
    const [trace] = parsed.data;
    return isObject(trace) ? trace : undefined;
  } catch {
    return undefined;
  }
}

const asArray = (value: unknown): unknown[] => (Array.isArray(value) ? value : []);

const roundTo = (value: number, decimals: number): number => {
  const factor = 10 ** decimals;
  return Math.round(value * factor) / factor;
};

export function extractTraderType(frame: DecodedFrame): ExtractedFields {
  const inner = firstGroup(/:.*?\[(.*?)\]/, markdownBody(frame));
  if (inner === undefined) {
    return NONE;
  }
  const label = inner
    .replace(/:material\/\S+\s*/g, '')
    .replace(/\s*\([^)]+\)\s*/g, '')
    .trim();
  return label ? { trader_type: label } : NONE;
}

export function extractTraderTypeDescription(frame: DecodedFrame): ExtractedFields {
  const body = markdownBody(frame).trim();
  return body ? { trader_type_description: body } : NONE;
}

export function extractTotalPositions(frame: DecodedFrame): ExtractedFields {
  const value = parseAmount(firstGroup(/>(\d+)<\/div>/, markdownBody(frame)));
  return value === undefined ? NONE : { total_positions: value };
}

/** `March 2024` → `2024-03`. */
export function toMonth(label: string): string | undefined {
  const parsed = DateTime.fromFormat(label, 'LLLL yyyy', { locale: 'en-US' });
  if (parsed.isValid) {
    return parsed.toFormat('yyyy-MM');
  }
  const short = DateTime.fromFormat(label, 'LLL yyyy', { locale: 'en-US' });
  return short.isValid ? short.toFormat('yyyy-MM') : undefined;
}

export function extractActiveSince(frame: DecodedFrame): ExtractedFields {
  const body = markdownBody(frame);
  const date = firstGroup(/color: #312e81;">([A-Za-z]+ \d{4})<\/div>/, body);
  const days = parseAmount(firstGroup(/color: #1e1b4b;">(\d+) days<\/div>/, body));
  const month = date === undefined ? undefined : toMonth(date);

  return {
    ...(date === undefined ? {} : { active_since_date: date }),
    ...(month === undefined ? {} : { active_since_month: month }),
    ...(days === undefined ? {} : { active_since_days: days }),
  };
}

export function extractCurrentBalance(frame: DecodedFrame): ExtractedFields {
  const value = parseAmount(firstGroup(/<span>([\d,]+\.?\d*)<\/span>/, markdownBody(frame)));
  return value === undefined ? NONE : { current_balance: value };
}

export function extractProfileLink(frame: DecodedFrame): ExtractedFields {
  const url = firstGroup(/href="(https:\/\/polymarket\.com\/profile\/[^"]+)"/, markdownBody(frame));
  return url === undefined ? NONE : { polymarket_url: url };
}

const RANK_FIELDS = {
  rank1d: ['rank_1d_place', 'rank_1d_amount'],
  rank7d: ['rank_7d_place', 'rank_7d_amount'],
  rank30d: ['rank_30d_place', 'rank_30d_amount'],
  rankAllTime: ['rank_all_time_place', 'rank_all_time_amount'],
} as const satisfies Record<RankTag, readonly [keyof ExtractedFields, keyof ExtractedFields]>;

export function extractRank(tag: RankTag, frame: DecodedFrame): ExtractedFields {
  const body = markdownBody(frame);
  const place = firstGroup(/Rank: #(\d+)/, body);
  const amount = firstGroup(/\$([\d.]+[kKmM]?)/, body);
  const [placeField, amountField] = RANK_FIELDS[tag];

  const fields: MutableFields = {};
  if (place !== undefined) {
    fields[placeField] = `#${place}`;
  }
  if (amount !== undefined) {
    fields[amountField] = `$${amount}`;
  }
  return fields;
}

export function extractSmartScoreSummary(frame: DecodedFrame): ExtractedFields {
  const body = markdownBody(frame);
  const score = parseAmount(firstGroup(/Smart Score: <strong>([\d.]+)<\/strong>/, body));
  const pnl = parseAmount(firstGroup(/Total PnL: <strong>\$([\d,]+\.?\d*)<\/strong>/, body));
  return {
    ...(score === undefined ? {} : { smart_score: score }),
    ...(pnl === undefined ? {} : { total_pnl: pnl }),
  };
}

export function extractSharpeRatio(frame: DecodedFrame): ExtractedFields {
  const value = parseAmount(firstGroup(/Sharpe Ratio: <span>([\d.]+)<\/span>/, markdownBody(frame)));
  return value === undefined ? NONE : { sharpe_ratio: value };
}

export function extractTradedVolume(frame: DecodedFrame): ExtractedFields {
  const value = parseAmount(firstGroup(/\$([\d,]+)/, metricBody(frame)));
  return value === undefined ? NONE : { traded_usd_volume_last_30d_sum: value };
}

function extractBetsSummary(frame: DecodedFrame): { amount?: number; pnl?: number } {
  const body = markdownBody(frame);
  return {
    amount: parseAmount(firstGroup(/font-size: 26px[^>]*>\s*\$([\d,]+\.?\d*)/, body)),
    pnl: parseAmount(firstGroup(/PnL:.*?<span[^>]*>\s*\$([\d,]+\.?\d*)/, body)),
  };
}

export function extractActiveBets(frame: DecodedFrame): ExtractedFields {
  const { amount, pnl } = extractBetsSummary(frame);
  return {
    ...(amount === undefined ? {} : { active_bets_amount: amount }),
    ...(pnl === undefined ? {} : { active_bets_pnl: pnl }),
  };
}

export function extractFinishedBets(frame: DecodedFrame): ExtractedFields {
  const { amount, pnl } = extractBetsSummary(frame);
  return {
    ...(amount === undefined ? {} : { finished_bets_amount: amount }),
    ...(pnl === undefined ? {} : { finished_bets_pnl: pnl }),
  };
}

const MINUS_SIGNS = /[−-]/;

/** ROI porcentual y monto de una operación; acepta el signo menos tipográfico. */
export function parseTrade(frame: DecodedFrame): { roiPercent?: number; roiAmount?: number } {
  const body = markdownBody(frame);
  const percent = firstGroup(/>([+−-]?[\d,]+\.?\d*)%</, body);
  const amountMatch = /\(([+−-]?)\$([\d,]+\.?\d*)\)/.exec(body);

  const roiPercent = percent === undefined ? undefined : parseAmount(percent.replace('−', '-').replace('+', ''));
  let roiAmount: number | undefined;
  if (amountMatch) {
    const magnitude = parseAmount(amountMatch[2]);
    if (magnitude !== undefined) {
      roiAmount = MINUS_SIGNS.test(amountMatch[1]) ? -magnitude : magnitude;
    }
  }
  return { roiPercent, roiAmount };
}

export function extractBestTrade(frame: DecodedFrame): ExtractedFields {
  const { roiPercent, roiAmount } = parseTrade(frame);
  return {
    ...(roiPercent === undefined ? {} : { best_trade_roi_proc: roiPercent }),
    ...(roiAmount === undefined ? {} : { best_trade_roi_amount: roiAmount }),
  };
}

export function extractWorstTrade(frame: DecodedFrame): ExtractedFields {
  const { roiPercent, roiAmount } = parseTrade(frame);
  return {
    ...(roiPercent === undefined ? {} : { worst_trade_roi_proc: roiPercent }),
    ...(roiAmount === undefined ? {} : { worst_trade_roi_amount: roiAmount }),
  };
}

export function extractPriceBuckets(frame: DecodedFrame): ExtractedFields {
  const trace = firstTrace(frame);
  if (!trace) {
    return NONE;
  }
  const xs = asArray(trace.x);
  const ys = asArray(trace.y);
  const buckets: Record<string, number> = {};
  xs.forEach((bucket, index) => {
    const value = ys[index];
    if (typeof value === 'number' && Number.isFinite(value)) {
      buckets[String(bucket)] = roundTo(value, 2);
    }
  });
  return { where_trader_bets_most: buckets };
}

/**
 * Gráfico polar por categoría: `theta` son las categorías y `r` los valores.
 * Plotly repite el primer punto al final para cerrar el polígono.
 */
export function parsePolarChart(frame: DecodedFrame): Record<string, number> | undefined {
  const trace = firstTrace(frame);
  if (!trace) {
    return undefined;
  }
  let categories = asArray(trace.theta);
  let values = asArray(trace.r);
  if (categories.length > 1 && categories[0] === categories[categories.length - 1]) {
    categories = categories.slice(0, -1);
    values = values.slice(0, -1);
  }

  const result: Record<string, number> = {};
  categories.forEach((category, index) => {
    const value = values[index];
    if (typeof value === 'number' && Number.isFinite(value)) {
      result[String(category)] = value;
    }
  });
  return result;
}

const categoryExtractor =
  (key: keyof CategoryMetrics): Extractor =>
  (frame) => {
    const metrics = parsePolarChart(frame);
    if (!metrics) {
      return NONE;
    }
    const categoryMetrics: { -readonly [K in keyof CategoryMetrics]: CategoryMetrics[K] } = {};
    categoryMetrics[key] = metrics;
    return { category_metrics: categoryMetrics };
  };

const EXTRACTORS: Partial<Record<Tag, Extractor>> = {
  typeLabel: extractTraderType,
  typeLabelDescription: extractTraderTypeDescription,
  totalPositions: extractTotalPositions,
  activeSince: extractActiveSince,
  currentBalance: extractCurrentBalance,
  profileLink: extractProfileLink,
  rank1d: (frame) => extractRank('rank1d', frame),
  rank7d: (frame) => extractRank('rank7d', frame),
  rank30d: (frame) => extractRank('rank30d', frame),
  rankAllTime: (frame) => extractRank('rankAllTime', frame),
  smartScoreSummary: extractSmartScoreSummary,
  sharpeRatio: extractSharpeRatio,
  tradedVolume30d: extractTradedVolume,
  activeBetsSummary: extractActiveBets,
  finishedBetsSummary: extractFinishedBets,
  bestTrade: extractBestTrade,
  worstTrade: extractWorstTrade,
  priceBuckets: extractPriceBuckets,
  mostTradedCategories: categoryExtractor('most_traded_categories'),
  smartScoreByCategory: categoryExtractor('smart_score_categories'),
  winRateByCategory: categoryExtractor('win_rate_categories'),
};

/** Extrae los campos que aporta un frame según su etiqueta. Nunca lanza. */
export function extract(tag: Tag, frame: DecodedFrame): ExtractedFields {
  const extractor = EXTRACTORS[tag];
  return extractor ? extractor(frame) : NONE;
}
