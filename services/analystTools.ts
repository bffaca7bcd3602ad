import type {
  AnalystContext,
  CapitalStructure,
  CompanyBundle,
  FinancialStatement,
  GrowthSchedule,
  HistoricalValuation,
  ProjectionAssumptions,
  ScenarioSensitivity,
  SensitivityStep,
  SensitivityVariable,
  ValuationResult,
  WACCResult,
  WaccInputs,
} from '../types';
import { run_fcff_dcf } from './dcfEngine';
import { IncompleteDataError, InvalidInputError, ValuationError } from './errors';

// Used when interest / debt gives no usable cost of debt.
export const FALLBACK_KD = 0.04;

// --- extract_capital_structure ---
export const extract_capital_structure = (bundle: CompanyBundle): CapitalStructure => {
  const latest = bundle.statements[0];
  const warnings: string[] = [];

  const equity_E = bundle.quote.market_cap ?? 0;
  if (bundle.quote.market_cap === null) warnings.push('Market capitalisation unavailable');
  const debt_D = latest.total_debt ?? 0;
  if (latest.total_debt === null) warnings.push(`Total debt not reported for ${latest.date}`);
  const cash = latest.cash_and_equivalents ?? 0;
  if (latest.cash_and_equivalents === null) warnings.push(`Cash not reported for ${latest.date}`);

  return {
    ticker: bundle.ticker,
    equity_market_value_E: equity_E,
    debt_book_value_D: debt_D,
    cash_and_equivalents: cash,
    net_debt: debt_D - cash,
    shares_outstanding: latest.shares_outstanding,
    beta: bundle.quote.beta,
    notes: ['Book debt used as proxy for market value of debt'],
    limitations: [`Reliance on the balance sheet dated ${latest.date}`],
    warnings,
  };
};

// --- estimate_wacc ---
export const estimate_wacc = (
  cap_struct: CapitalStructure,
  statement: FinancialStatement,
  inputs: WaccInputs,
): WACCResult => {
  const { rf, erp } = inputs;
  const warnings: string[] = [];

  const beta = inputs.beta_override ?? cap_struct.beta;
  if (beta === null) throw new IncompleteDataError(['beta'], statement.date);
  if (inputs.beta_override != null) warnings.push('User provided Beta override');

  // Cost of Equity (CAPM)
  const ke = rf + beta * erp;

  const t_effective = statement.tax_rate;
  if (t_effective === null) throw new IncompleteDataError(['tax_rate'], statement.date);

  // Kd = Interest Expense / Total Debt (simplified proxy)
  let kd_pre_tax: number;
  if (inputs.kd_override != null) {
    kd_pre_tax = inputs.kd_override;
  } else if (statement.interest_expense !== null && cap_struct.debt_book_value_D > 0) {
    kd_pre_tax = Math.abs(statement.interest_expense) / cap_struct.debt_book_value_D;
  } else {
    kd_pre_tax = FALLBACK_KD;
    warnings.push(`Cost of debt not derivable from statements; using ${FALLBACK_KD}`);
  }
  if (kd_pre_tax < 0.01) {
    warnings.push(`Implied cost of debt ${kd_pre_tax.toFixed(4)} below 1%; using ${FALLBACK_KD}`);
    kd_pre_tax = FALLBACK_KD;
  }

  const kd_after_tax = kd_pre_tax * (1 - t_effective);

  // Weights
  const V = cap_struct.equity_market_value_E + cap_struct.debt_book_value_D;
  if (cap_struct.equity_market_value_E <= 0 || V <= 0) {
    throw new InvalidInputError(`Cannot weight capital for ${cap_struct.ticker}: market capitalisation unavailable`);
  }
  const w_e = cap_struct.equity_market_value_E / V;
  const w_d = cap_struct.debt_book_value_D / V;

  const wacc = ke * w_e + kd_after_tax * w_d;

  return {
    rf,
    erp,
    beta_used: beta,
    cost_of_equity_ke: Number(ke.toFixed(5)),
    tax_rate_effective: Number(t_effective.toFixed(4)),
    cost_of_debt_kd: Number(kd_pre_tax.toFixed(4)),
    weights: { w_e: Number(w_e.toFixed(4)), w_d: Number(w_d.toFixed(4)) },
    wacc: Number(wacc.toFixed(5)),
    warnings,
    limitations: ['Kd estimated via Interest Expense / Book Debt proxy'],
    components: {
      equity_market_value_E: cap_struct.equity_market_value_E,
      debt_book_value_D: cap_struct.debt_book_value_D,
    },
  };
};

export const shift_growth = (growth: GrowthSchedule, delta: number): GrowthSchedule =>
  growth.kind === 'flat'
    ? { kind: 'flat', rate: growth.rate + delta }
    : { kind: 'staged', rates: growth.rates.map((r) => r + delta) };

export const scale_growth = (growth: GrowthSchedule, factor: number): GrowthSchedule =>
  growth.kind === 'flat'
    ? { kind: 'flat', rate: growth.rate * factor }
    : { kind: 'staged', rates: growth.rates.map((r) => r * factor) };

// --- run_scenarios_and_sensitivity ---
export const run_scenarios_and_sensitivity = (
  statement: FinancialStatement,
  base_inputs: ProjectionAssumptions,
  spot: number | null,
): ScenarioSensitivity => {
  const base_wacc = base_inputs.discount_rate;
  const g = base_inputs.terminal_growth;
  const warnings: string[] = [];

  // Base
  const base = run_fcff_dcf(statement, base_inputs, spot);

  // Bull: WACC - 1%, Growth + 2%. WACC is held half a point above terminal g.
  const bull_floor = g + 0.005;
  let bull_wacc = base_wacc - 0.01;
  if (bull_wacc <= bull_floor) {
    bull_wacc = Math.min(base_wacc, bull_floor);
    warnings.push(`Bull-case WACC held at ${bull_wacc.toFixed(4)} to stay above terminal growth`);
  }
  const bull = run_fcff_dcf(
    statement,
    { ...base_inputs, discount_rate: bull_wacc, growth: shift_growth(base_inputs.growth, 0.02) },
    spot,
  );

  // Bear: WACC + 1%, Growth - 2%
  const bear = run_fcff_dcf(
    statement,
    { ...base_inputs, discount_rate: base_wacc + 0.01, growth: shift_growth(base_inputs.growth, -0.02) },
    spot,
  );

  // Sensitivity Matrix (WACC x Terminal G)
  const wacc_range = [base_wacc - 0.01, base_wacc - 0.005, base_wacc, base_wacc + 0.005, base_wacc + 0.01];
  const g_range = [g - 0.005, g, g + 0.005];

  const matrix: (number | null)[][] = wacc_range.map((w) =>
    g_range.map((tg) => {
      if (w <= tg) return null;
      return run_fcff_dcf(statement, { ...base_inputs, discount_rate: w, terminal_growth: tg }, null)
        .value_per_share;
    }),
  );
  if (matrix.some((row) => row.includes(null))) {
    warnings.push('Sensitivity cells with WACC <= terminal growth are left empty');
  }

  return {
    scenarios: { base, bull, bear },
    sensitivity: {
      wacc_values: wacc_range,
      g_values: g_range,
      value_per_share_matrix: matrix,
    },
    warnings,
    limitations: ['Scenario spreads are fixed (+/-1pt WACC, +/-2pt growth)'],
  };
};

const apply_variable = (
  a: ProjectionAssumptions,
  variable: SensitivityVariable,
  factor: number,
): { assumptions: ProjectionAssumptions; value: number } => {
  switch (variable) {
    case 'growth': {
      const growth = scale_growth(a.growth, factor);
      return { assumptions: { ...a, growth }, value: growth.kind === 'flat' ? growth.rate : growth.rates[0] };
    }
    case 'discount_rate':
      return { assumptions: { ...a, discount_rate: a.discount_rate * factor }, value: a.discount_rate * factor };
    case 'terminal_growth':
      return { assumptions: { ...a, terminal_growth: a.terminal_growth * factor }, value: a.terminal_growth * factor };
  }
};

/**
 * Values the company with one variable raised by `step_increase` per step,
 * i.e. base * (1 + step_increase * i) for i = 1..steps.
 */
export const run_step_sensitivity = (
  statement: FinancialStatement,
  base_inputs: ProjectionAssumptions,
  variable: SensitivityVariable,
  step_increase: number,
  steps: number,
  spot: number | null = null,
): SensitivityStep[] => {
  const out: SensitivityStep[] = [];
  for (let i = 1; i <= steps; i++) {
    const { assumptions, value } = apply_variable(base_inputs, variable, 1 + step_increase * i);
    const label = `${variable}: ${value.toFixed(4)}`;
    try {
      out.push({ label, value, ok: true, result: run_fcff_dcf(statement, assumptions, spot) });
    } catch (error) {
      if (!(error instanceof ValuationError)) throw error;
      out.push({ label, value, ok: false, error: error.message });
    }
  }
  return out;
};

/** One valuation per reported period, newest first. Only the latest is compared with spot. */
export const run_historical_dcf = (
  statements: FinancialStatement[],
  assumptions: ProjectionAssumptions,
  spot: number | null,
  periods: number,
): HistoricalValuation[] =>
  statements.slice(0, periods).map((statement, i): HistoricalValuation => {
    try {
      return { date: statement.date, ok: true, result: run_fcff_dcf(statement, assumptions, i === 0 ? spot : null) };
    } catch (error) {
      if (!(error instanceof ValuationError)) throw error;
      return { date: statement.date, ok: false, error: error.message };
    }
  });

// --- build_context_json ---
export const build_context_json = (
  bundle: CompanyBundle,
  inputs: ProjectionAssumptions,
  cs: CapitalStructure,
  wacc: WACCResult | null,
  valuation: ValuationResult,
  sens: ScenarioSensitivity | null,
): AnalystContext => {
  return {
    meta: {
      ticker: bundle.ticker,
      period: bundle.period,
      source: 'financialmodelingprep.com',
      generated_at_utc: new Date().toISOString(),
      cache_used: bundle.cache_used,
    },
    inputs: {
      ticker: bundle.ticker,
      horizon_years: inputs.horizon_years,
      growth: inputs.growth,
      discount_rate: inputs.discount_rate,
      terminal_growth: inputs.terminal_growth,
    },
    capital_structure: cs,
    wacc,
    valuation,
    sensitivity: sens,
    limitations: [
      ...cs.limitations,
      ...(wacc?.limitations ?? []),
      ...valuation.limitations,
      ...(sens?.limitations ?? []),
    ],
    warnings: [...cs.warnings, ...(wacc?.warnings ?? []), ...valuation.warnings, ...(sens?.warnings ?? [])],
  };
};
