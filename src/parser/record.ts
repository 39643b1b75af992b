export type CategoryMetrics = {
  readonly most_traded_categories?: Readonly<Record<string, number>>;
  readonly smart_score_categories?: Readonly<Record<string, number>>;
  readonly win_rate_categories?: Readonly<Record<string, number>>;
};

export type UserRecord = {
  readonly trader_types: readonly string[];
  readonly trader_type_descriptions: Readonly<Record<string, string>>;
  readonly total_positions: number | null;
  readonly active_since_date: string | null;
  readonly active_since_month: string | null;
  readonly active_since_days: number | null;
  readonly current_balance: number | null;
  readonly polymarket_url: string | null;
  readonly rank_1d_place: string | null;
  readonly rank_1d_amount: string | null;
  readonly rank_7d_place: string | null;
  readonly rank_7d_amount: string | null;
  readonly rank_30d_place: string | null;
  readonly rank_30d_amount: string | null;
  readonly rank_all_time_place: string | null;
  readonly rank_all_time_amount: string | null;
  readonly smart_score: number | null;
  readonly total_pnl: number | null;
  readonly sharpe_ratio: number | null;
  readonly traded_usd_volume_last_30d_sum: number | null;
  readonly active_bets_amount: number | null;
  readonly active_bets_pnl: number | null;
  readonly finished_bets_amount: number | null;
  readonly finished_bets_pnl: number | null;
  readonly best_trade_roi_proc: number | null;
  readonly best_trade_roi_amount: number | null;
  readonly worst_trade_roi_proc: number | null;
  readonly worst_trade_roi_amount: number | null;
  readonly where_trader_bets_most: Readonly<Record<string, number>> | null;
  readonly category_metrics: CategoryMetrics;
};

type AccumulatedField = 'trader_types' | 'trader_type_descriptions' | 'category_metrics';

export type ScalarFields = Omit<UserRecord, AccumulatedField>;

/**
 * Campos extraídos de un único frame. Los escalares sobrescriben; la etiqueta
 * de tipo se añade a `trader_types` y la descripción se asocia a la última
 * etiqueta vista.
 */
export type ExtractedFields = Partial<ScalarFields> & {
  readonly trader_type?: string;
  readonly trader_type_description?: string;
  readonly category_metrics?: CategoryMetrics;
};

export function emptyRecord(): UserRecord {
  return {
    trader_types: [],
    trader_type_descriptions: {},
    total_positions: null,
    active_since_date: null,
    active_since_month: null,
    active_since_days: null,
    current_balance: null,
    polymarket_url: null,
    rank_1d_place: null,
    rank_1d_amount: null,
    rank_7d_place: null,
    rank_7d_amount: null,
    rank_30d_place: null,
    rank_30d_amount: null,
    rank_all_time_place: null,
    rank_all_time_amount: null,
    smart_score: null,
    total_pnl: null,
    sharpe_ratio: null,
    traded_usd_volume_last_30d_sum: null,
    active_bets_amount: null,
    active_bets_pnl: null,
    finished_bets_amount: null,
    finished_bets_pnl: null,
    best_trade_roi_proc: null,
    best_trade_roi_amount: null,
    worst_trade_roi_proc: null,
    worst_trade_roi_amount: null,
    where_trader_bets_most: null,
    category_metrics: {},
  };
}

export function mergeRecord(record: UserRecord, fields: ExtractedFields): UserRecord {
  const { trader_type, trader_type_description, category_metrics, ...scalars } = fields;

  let traderTypes = record.trader_types;
  if (trader_type && !traderTypes.includes(trader_type)) {
    traderTypes = [...traderTypes, trader_type];
  }

  let descriptions = record.trader_type_descriptions;
  const describedLabel = traderTypes[traderTypes.length - 1];
  if (trader_type_description && describedLabel) {
    descriptions = { ...descriptions, [describedLabel]: trader_type_description };
  }

  return {
    ...record,
    ...scalars,
    trader_types: traderTypes,
    trader_type_descriptions: descriptions,
    category_metrics: category_metrics ? { ...record.category_metrics, ...category_metrics } : record.category_metrics,
  };
}

/** Cantidad de campos con valor: escalares no nulos y colecciones no vacías. */
export function countFilledFields(record: UserRecord): number {
  return Object.values(record).filter((value) => {
    if (value === null) {
      return false;
    }
    if (Array.isArray(value)) {
      return value.length > 0;
    }
    if (typeof value === 'object') {
      return Object.keys(value).length > 0;
    }
    return true;
  }).length;
}
