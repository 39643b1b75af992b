/** Etiquetas semánticas que el clasificador asigna a cada frame decodificado. */
export const TAGS = [
  'typeLabel',
  'typeLabelDescription',
  'totalPositions',
  'activeSince',
  'currentBalance',
  'profileLink',
  'rank1d',
  'rank7d',
  'rank30d',
  'rankAllTime',
  'smartScoreSummary',
  'historicalPnlChart',
  'sharpeRatio',
  'tradedVolume30d',
  'activeBetsSummary',
  'activeBetsTable',
  'finishedBetsSummary',
  'finishedBetsTable',
  'bestTrade',
  'worstTrade',
  'roiDistribution',
  'mostTradedCategories',
  'smartScoreByCategory',
  'winRateByCategory',
  'recentTradesTable',
  'priceBuckets',
  'streamComplete',
  'unclassified',
] as const;

export type Tag = (typeof TAGS)[number];

/** Orden de llegada de la familia de rankings. */
export const RANK_TAGS = ['rank1d', 'rank7d', 'rank30d', 'rankAllTime'] as const satisfies readonly Tag[];

export type RankTag = (typeof RANK_TAGS)[number];

export type TagCounts = Partial<Record<Tag, number>>;
