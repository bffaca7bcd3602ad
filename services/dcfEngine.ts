import type {
  CashFlowProjection,
  FinancialStatement,
  GrowthSchedule,
  ProjectionAssumptions,
  ValuationResult,
  Verdict,
} from '../types';
import { IncompleteDataError, InvalidAssumptionsError, InvalidInputError } from './errors';

// Upside within +/- this band of spot reads as fairly valued.
export const FAIR_VALUE_BAND = 0.05;

const REQUIRED_FIELDS = [
  'operating_income',
  'tax_rate',
  'depreciation_amortization',
  'capital_expenditure',
  'change_in_working_capital',
] as const;

const isFiniteNumber = (n: number) => typeof n === 'number' && Number.isFinite(n);

export const validate_assumptions = (a: ProjectionAssumptions): void => {
  if (!Number.isInteger(a.horizon_years) || a.horizon_years < 1) {
    throw new InvalidAssumptionsError(`Projection horizon must be a whole number of years >= 1, got ${a.horizon_years}`);
  }
  if (!isFiniteNumber(a.discount_rate) || !isFiniteNumber(a.terminal_growth)) {
    throw new InvalidAssumptionsError('Discount rate and terminal growth must be finite numbers');
  }

  const rates = a.growth.kind === 'flat' ? [a.growth.rate] : a.growth.rates;
  if (rates.length === 0) {
    throw new InvalidAssumptionsError('Staged growth schedule needs at least one rate');
  }
  for (const r of rates) {
    if (!isFiniteNumber(r) || r <= -1) {
      throw new InvalidAssumptionsError(`Growth rates must be finite and above -100%, got ${r}`);
    }
  }

  // (1 + r)^n must stay positive for every discount step.
  if (a.discount_rate <= -1 || a.terminal_growth <= -1) {
    throw new InvalidAssumptionsError(
      `Discount rate and terminal growth must be above -100%, got ${a.discount_rate} and ${a.terminal_growth}`,
    );
  }

  // TV denominator (WACC - g) must stay positive.
  if (a.discount_rate <= a.terminal_growth) {
    throw new InvalidAssumptionsError(
      `Discount rate (${a.discount_rate}) must be greater than terminal growth (${a.terminal_growth})`,
    );
  }
};

/** Unlevered FCF for one period: EBIT(1 - t) + D&A - capex - increase in working capital. */
export const compute_base_fcf = (s: FinancialStatement): number => {
  const {
    operating_income: ebit,
    tax_rate: t,
    depreciation_amortization: da,
    capital_expenditure: capex,
    change_in_working_capital: dwc,
  } = s;

  if (ebit === null || t === null || da === null || capex === null || dwc === null) {
    throw new IncompleteDataError(
      REQUIRED_FIELDS.filter((field) => s[field] === null),
      s.date,
    );
  }
  const bad = REQUIRED_FIELDS.filter((field) => !Number.isFinite(s[field]));
  if (bad.length > 0) {
    throw new IncompleteDataError(bad, s.date);
  }

  return ebit * (1 - t) + da - capex - dwc;
};

export const growth_rates_for = (growth: GrowthSchedule, horizon: number): number[] => {
  if (growth.kind === 'flat') {
    return Array.from({ length: horizon }, () => growth.rate);
  }
  const last = growth.rates[growth.rates.length - 1];
  return Array.from({ length: horizon }, (_, i) => growth.rates[i] ?? last);
};

/** Linear fade from `start` to `end` over `years` (both ends inclusive). */
export const declining_growth = (start: number, end: number, years: number): GrowthSchedule => {
  if (years <= 1) return { kind: 'staged', rates: [start] };
  const step = (end - start) / (years - 1);
  return {
    kind: 'staged',
    rates: Array.from({ length: years }, (_, i) => start + step * i),
  };
};

export const discount_factor = (rate: number, year: number): number => 1 / Math.pow(1 + rate, year);

/** Present value of each flow; the first one falls a full year out. */
export const discount_cash_flows = (cash_flows: number[], rate: number): number[] =>
  cash_flows.map((cf, i) => cf / Math.pow(1 + rate, i + 1));

export const project_cash_flows = (base_fcf: number, a: ProjectionAssumptions): CashFlowProjection => {
  const rates = growth_rates_for(a.growth, a.horizon_years);

  const fcfs: number[] = [];
  let current_fcf = base_fcf;
  for (const g of rates) {
    current_fcf = current_fcf * (1 + g);
    fcfs.push(current_fcf);
  }
  const present_values = discount_cash_flows(fcfs, a.discount_rate);

  return rates.map((g, i) => ({
    year: i + 1,
    growth_rate: g,
    fcf: fcfs[i],
    discount_factor: discount_factor(a.discount_rate, i + 1),
    present_value: present_values[i],
  }));
};

/** Gordon growth on the final projected year. Caller guarantees rate > g. */
export const terminal_value = (final_fcf: number, rate: number, g: number): number =>
  (final_fcf * (1 + g)) / (rate - g);

export const valuation_verdict = (
  value_per_share: number,
  market_price: number | null,
): { upside: number | null; verdict: Verdict | null } => {
  if (market_price === null || !(market_price > 0)) {
    return { upside: null, verdict: null };
  }
  const upside = (value_per_share - market_price) / market_price;
  let verdict: Verdict = 'fairly valued';
  if (upside > FAIR_VALUE_BAND) verdict = 'undervalued';
  else if (upside < -FAIR_VALUE_BAND) verdict = 'overvalued';
  return { upside, verdict };
};

/**
 * FCFF DCF on the latest statement.
 *
 * Checks run in a fixed order: assumptions, then shares, then the statement
 * fields feeding FCF. No field is ever defaulted to zero silently; net-debt
 * inputs are the only optional ones and each gap adds a warning.
 */
export const run_fcff_dcf = (
  statement: FinancialStatement,
  assumptions: ProjectionAssumptions,
  market_price: number | null = null,
): ValuationResult => {
  validate_assumptions(assumptions);

  const shares = statement.shares_outstanding;
  if (shares === null || !Number.isFinite(shares) || shares <= 0) {
    throw new InvalidInputError(
      `Shares outstanding must be a positive number (statement ${statement.date}, got ${shares ?? 'nothing'})`,
    );
  }

  const warnings: string[] = [];
  const base_fcf = compute_base_fcf(statement);
  if (base_fcf < 0) {
    warnings.push('Base-year free cash flow is negative; projected flows compound a loss');
  }

  // 1. Forecast period PV
  const projection = project_cash_flows(base_fcf, assumptions);
  const pv_forecast = projection.reduce((sum, y) => sum + y.present_value, 0);

  // 2. Terminal value PV
  const fcf_final = projection[projection.length - 1].fcf;
  const tv = terminal_value(fcf_final, assumptions.discount_rate, assumptions.terminal_growth);
  const pv_terminal = tv / Math.pow(1 + assumptions.discount_rate, assumptions.horizon_years);

  // 3. Enterprise value
  const ev = pv_forecast + pv_terminal;

  // 4. Equity value
  if (statement.total_debt === null) warnings.push('Total debt not reported; treated as zero in net debt');
  if (statement.cash_and_equivalents === null) warnings.push('Cash not reported; treated as zero in net debt');
  const net_debt = (statement.total_debt ?? 0) - (statement.cash_and_equivalents ?? 0);
  const equity_val = ev - net_debt;

  // 5. Per share
  let val_per_share = equity_val / shares;
  if (val_per_share < 0) {
    warnings.push('Equity value is negative; per-share value floored at zero');
    val_per_share = 0;
  }

  const { upside, verdict } = valuation_verdict(val_per_share, market_price);

  return Object.freeze({
    assumptions,
    statement_date: statement.date,
    base_fcf,
    projection,
    pv_forecast,
    terminal_value: tv,
    pv_terminal,
    enterprise_value_ev: ev,
    net_debt,
    equity_value: equity_val,
    value_per_share: val_per_share,
    market_price,
    upside_vs_spot: upside,
    verdict,
    warnings,
    limitations: [
      'FCFF built from EBIT(1 - t) + D&A - capex - change in working capital of the latest period',
      'Book debt used as proxy for market value of debt',
    ],
  });
};
