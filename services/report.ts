import type {
  CompanyBundle,
  GrowthSchedule,
  HistoricalValuation,
  ScenarioSensitivity,
  SensitivityStep,
  ValuationResult,
  WACCResult,
} from '../types';
import type { CacheInfo } from './cacheService';

const RULE = '-'.repeat(60);

export const format_money = (amount: number, currency = 'USD'): string =>
  new Intl.NumberFormat('en-US', {
    style: 'currency',
    currency,
    notation: 'compact',
    maximumFractionDigits: 2,
  }).format(amount);

export const format_price = (amount: number, currency = 'USD'): string =>
  new Intl.NumberFormat('en-US', {
    style: 'currency',
    currency,
    minimumFractionDigits: 2,
    maximumFractionDigits: 2,
  }).format(amount);

export const format_percent = (rate: number, signed = false): string => {
  const pct = `${(rate * 100).toFixed(2)}%`;
  return signed && rate > 0 ? `+${pct}` : pct;
};

export const describe_growth = (growth: GrowthSchedule): string =>
  growth.kind === 'flat'
    ? `${format_percent(growth.rate)} flat`
    : `staged ${growth.rates.map((r) => format_percent(r)).join(' > ')}`;

const projected_year_label = (statement_date: string, year: number): string => {
  const base = Number(statement_date.slice(0, 4));
  return Number.isInteger(base) ? String(base + year) : `+${year}`;
};

export const format_projection_table = (result: ValuationResult, currency = 'USD'): string => {
  const header = ['Year', 'Growth', 'FCF', 'Discount', 'PV'];
  const rows = result.projection.map((y) => [
    projected_year_label(result.statement_date, y.year),
    format_percent(y.growth_rate),
    format_money(y.fcf, currency),
    y.discount_factor.toFixed(4),
    format_money(y.present_value, currency),
  ]);
  const widths = header.map((h, i) => Math.max(h.length, ...rows.map((r) => r[i].length)));
  const line = (cells: string[]) => cells.map((c, i) => c.padStart(widths[i])).join(' | ');
  return [line(header), widths.map((w) => '-'.repeat(w)).join('-+-'), ...rows.map(line)].join('\n');
};

export const format_report = (bundle: CompanyBundle, result: ValuationResult): string => {
  const ccy = bundle.quote.currency;
  const a = result.assumptions;
  const lines = [
    `DCF valuation: ${bundle.quote.company_name} (${bundle.ticker})`,
    RULE,
    `Statement date: ${result.statement_date}${bundle.period === 'quarter' ? ' (quarterly figures, not annualised)' : ''}`,
    `Assumptions: horizon ${a.horizon_years}y, growth ${describe_growth(a.growth)}, discount ${format_percent(a.discount_rate)}, terminal growth ${format_percent(a.terminal_growth)}`,
    `Base-year FCF: ${format_money(result.base_fcf, ccy)}`,
    '',
    format_projection_table(result, ccy),
    '',
    `PV of forecast cash flows: ${format_money(result.pv_forecast, ccy)}`,
    `Terminal value: ${format_money(result.terminal_value, ccy)} (PV ${format_money(result.pv_terminal, ccy)})`,
    `Enterprise value: ${format_money(result.enterprise_value_ev, ccy)}`,
    `Net debt: ${format_money(result.net_debt, ccy)}`,
    `Equity value: ${format_money(result.equity_value, ccy)}`,
    RULE,
    `Intrinsic value per share: ${format_price(result.value_per_share, ccy)}`,
    `Market price: ${result.market_price === null ? 'unavailable' : format_price(result.market_price, ccy)}`,
  ];

  if (result.upside_vs_spot !== null && result.verdict !== null) {
    lines.push(`Upside vs market: ${format_percent(result.upside_vs_spot, true)} (${result.verdict})`);
  }
  if (result.warnings.length > 0) {
    lines.push('', 'Warnings:', ...result.warnings.map((w) => `  - ${w}`));
  }
  return lines.join('\n');
};

/** Horizontal bars: solid for projected FCF, shaded for its present value. */
export const format_cash_flow_chart = (result: ValuationResult, width = 40, currency = 'USD'): string => {
  const peak = Math.max(...result.projection.map((y) => Math.max(Math.abs(y.fcf), Math.abs(y.present_value))));
  const bar = (v: number, glyph: string) => (peak > 0 ? glyph.repeat(Math.round((Math.abs(v) / peak) * width)) : '');

  const lines = ['Projected free cash flow (█ FCF, ▒ present value)'];
  for (const y of result.projection) {
    const label = projected_year_label(result.statement_date, y.year);
    lines.push(`${label} ${bar(y.fcf, '█')} ${format_money(y.fcf, currency)}`);
    lines.push(`${' '.repeat(label.length)} ${bar(y.present_value, '▒')} ${format_money(y.present_value, currency)}`);
  }
  return lines.join('\n');
};

export const format_wacc = (w: WACCResult): string =>
  [
    'WACC (CAPM)',
    RULE,
    `Cost of equity: ${format_percent(w.cost_of_equity_ke)} (rf ${format_percent(w.rf)}, beta ${w.beta_used}, ERP ${format_percent(w.erp)})`,
    `Cost of debt: ${format_percent(w.cost_of_debt_kd)} pre-tax, tax rate ${format_percent(w.tax_rate_effective)}`,
    `Weights: equity ${format_percent(w.weights.w_e)}, debt ${format_percent(w.weights.w_d)}`,
    `WACC: ${format_percent(w.wacc)}`,
    ...w.warnings.map((m) => `  - ${m}`),
  ].join('\n');

export const format_sensitivity = (s: ScenarioSensitivity, currency = 'USD'): string => {
  const scenario = (name: string, r: ValuationResult) =>
    `${name.padEnd(5)} WACC ${format_percent(r.assumptions.discount_rate)}, growth ${describe_growth(r.assumptions.growth)}: ` +
    `${format_price(r.value_per_share, currency)}` +
    (r.upside_vs_spot === null ? '' : ` (${format_percent(r.upside_vs_spot, true)})`);

  const cell = (v: number | null) => (v === null ? 'n/a' : format_price(v, currency));
  const grid = s.sensitivity.value_per_share_matrix.map((row) => row.map(cell));
  const colWidth = Math.max(10, ...grid.flat().map((c) => c.length));
  const header = ['WACC \\ g'.padEnd(9), ...s.sensitivity.g_values.map((g) => format_percent(g).padStart(colWidth))];
  const rows = grid.map((row, i) => [
    format_percent(s.sensitivity.wacc_values[i]).padEnd(9),
    ...row.map((c) => c.padStart(colWidth)),
  ]);

  return [
    'Scenarios',
    RULE,
    scenario('Bear', s.scenarios.bear),
    scenario('Base', s.scenarios.base),
    scenario('Bull', s.scenarios.bull),
    '',
    'Value per share, WACC x terminal growth',
    header.join(' '),
    ...rows.map((r) => r.join(' ')),
    ...s.warnings.map((w) => `  - ${w}`),
  ].join('\n');
};

export const format_step_sensitivity = (steps: SensitivityStep[], currency = 'USD'): string =>
  [
    'Step sensitivity',
    RULE,
    ...steps.map((s) =>
      s.ok ? `${s.label} -> ${format_price(s.result.value_per_share, currency)}` : `${s.label} -> failed: ${s.error}`,
    ),
  ].join('\n');

export const format_historical = (history: HistoricalValuation[], currency = 'USD'): string =>
  [
    'Historical valuations',
    RULE,
    ...history.map((h) =>
      h.ok
        ? `${h.date}: ${format_price(h.result.value_per_share, currency)} per share (EV ${format_money(h.result.enterprise_value_ev, currency)})`
        : `${h.date}: skipped (${h.error})`,
    ),
  ].join('\n');

export const format_cache_info = (info: CacheInfo): string => {
  const lines = [
    `Cache directory: ${info.cache_directory}`,
    `Total files: ${info.total_files}`,
    `Total size: ${(info.total_size_bytes / (1024 * 1024)).toFixed(2)} MB`,
  ];
  if (info.files.length === 0) {
    lines.push('No cached files found.');
    return lines.join('\n');
  }
  lines.push('Cached files:');
  for (const f of info.files) {
    if (f.error) {
      lines.push(`  ! ${f.file}: ${f.error}`);
    } else {
      lines.push(`  ${f.is_valid ? '✓' : '✗'} ${f.file} (${f.ticker} - ${f.resource}), cached ${f.cached_at}, ${f.size_bytes} bytes`);
    }
  }
  return lines.join('\n');
};
