import assert from 'node:assert/strict';
import { test } from 'node:test';

import {
  extract,
  extractActiveBets,
  extractActiveSince,
  extractRank,
  extractTraderType,
  parsePolarChart,
  parseTrade,
  toMonth,
} from '../src/parser/extractors.js';
import {
  ACTIVE_BETS,
  ACTIVE_SINCE,
  BEST_TRADE,
  CURRENT_BALANCE,
  FINISHED_BETS,
  MOST_TRADED,
  PRICE_BUCKETS,
  PROFILE_LINK,
  SHARPE,
  SMART_SCORE,
  TOTAL_POSITIONS,
  TYPE_DESCRIPTION,
  TYPE_LABEL,
  VOLUME,
  WIN_RATE,
  WORST_TRADE,
  markdown,
  plotly,
  rank,
} from './fixtures/frames.js';

test('extractTraderType limpia iconos y porcentajes de la etiqueta', () => {
  assert.deepEqual(extractTraderType(TYPE_LABEL), { trader_type: 'Whale' });
  assert.deepEqual(extractTraderType(markdown('sin corchetes')), {});
});

test('extract de la descripción conserva el texto sin espacios extremos', () => {
  assert.deepEqual(extract('typeLabelDescription', TYPE_DESCRIPTION), {
    trader_type_description: 'Large positions across many markets.',
  });
});

test('extractores de atributos del perfil', () => {
  assert.deepEqual(extract('totalPositions', TOTAL_POSITIONS), { total_positions: 42 });
  assert.deepEqual(extract('currentBalance', CURRENT_BALANCE), { current_balance: 12345.67 });
  assert.deepEqual(extract('profileLink', PROFILE_LINK), {
    polymarket_url: 'https://polymarket.com/profile/0xabc',
  });
  assert.deepEqual(extract('sharpeRatio', SHARPE), { sharpe_ratio: 1.75 });
  assert.deepEqual(extract('tradedVolume30d', VOLUME), { traded_usd_volume_last_30d_sum: 120000 });
  assert.deepEqual(extract('smartScoreSummary', SMART_SCORE), { smart_score: 87.5, total_pnl: 10500.25 });
});

test('extractActiveSince devuelve fecha, mes normalizado y días', () => {
  assert.deepEqual(extractActiveSince(ACTIVE_SINCE), {
    active_since_date: 'March 2024',
    active_since_month: '2024-03',
    active_since_days: 590,
  });
  assert.deepEqual(extractActiveSince(markdown('<div>Active Since</div>')), {});
});

test('toMonth acepta meses completos y abreviados', () => {
  assert.equal(toMonth('November 2023'), '2023-11');
  assert.equal(toMonth('Jan 2025'), '2025-01');
  assert.equal(toMonth('Smarch 2024'), undefined);
});

test('extractRank escribe en los campos de la ventana indicada', () => {
  assert.deepEqual(extractRank('rank30d', rank(7, '20k')), { rank_30d_place: '#7', rank_30d_amount: '$20k' });
  assert.deepEqual(extract('rankAllTime', rank(150, '1.1M')), {
    rank_all_time_place: '#150',
    rank_all_time_amount: '$1.1M',
  });
  assert.deepEqual(extractRank('rank1d', markdown('<div>Rank: —</div>')), {});
});

test('resúmenes de apuestas activas y finalizadas', () => {
  assert.deepEqual(extractActiveBets(ACTIVE_BETS), { active_bets_amount: 5000.5, active_bets_pnl: 250.25 });
  assert.deepEqual(extract('finishedBetsSummary', FINISHED_BETS), {
    finished_bets_amount: 9000,
    finished_bets_pnl: 75,
  });
});

test('parseTrade interpreta el signo menos tipográfico', () => {
  assert.deepEqual(parseTrade(BEST_TRADE), { roiPercent: 150.5, roiAmount: 1200 });
  assert.deepEqual(parseTrade(WORST_TRADE), { roiPercent: -80.25, roiAmount: -400 });
  assert.deepEqual(extract('worstTrade', WORST_TRADE), { worst_trade_roi_proc: -80.25, worst_trade_roi_amount: -400 });
});

test('parsePolarChart descarta el punto de cierre repetido', () => {
  assert.deepEqual(parsePolarChart(MOST_TRADED), { Politics: 10, Sports: 5 });
  assert.deepEqual(extract('winRateByCategory', WIN_RATE), {
    category_metrics: { win_rate_categories: { Politics: 0.55, Crypto: 0.6 } },
  });
  assert.equal(parsePolarChart(markdown('sin gráfico')), undefined);
});

test('extractPriceBuckets redondea a dos decimales', () => {
  assert.deepEqual(extract('priceBuckets', PRICE_BUCKETS), {
    where_trader_bets_most: { '0-10c': 12.35, '10-20c': 7 },
  });
});

test('un spec de plotly inválido no aporta campos', () => {
  const broken = { delta: { newElement: { plotlyChart: { spec: '{no es json' } } } };
  assert.deepEqual(extract('priceBuckets', broken), {});
  assert.deepEqual(extract('smartScoreByCategory', plotly({ layout: {} })), {});
});

test('las etiquetas sin extractor no aportan campos', () => {
  assert.deepEqual(extract('historicalPnlChart', TOTAL_POSITIONS), {});
  assert.deepEqual(extract('unclassified', TOTAL_POSITIONS), {});
  assert.deepEqual(extract('streamComplete', { scriptFinished: 'FINISHED_SUCCESSFULLY' }), {});
});
