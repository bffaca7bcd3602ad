// Shared shapes for the valuation pipeline. Field names follow the report/JSON
// output rather than the provider's wire format (see services/statements.ts).

/** Reporting period of the statements FMP returns. */
export type StatementPeriod = 'annual' | 'quarter';

export interface Meta {
  ticker: string;
  period: StatementPeriod;
  source: string;
  generated_at_utc: string;
  cache_used: boolean;
}

/** One fiscal period's reported figures. `null` = not reported by the provider. */
export interface FinancialStatement {
  readonly date: string;
  readonly fiscal_year: string;
  readonly revenue: number | null;
  readonly operating_income: number | null;
  readonly depreciation_amortization: number | null;
  /** Positive outflow. */
  readonly capital_expenditure: number | null;
  /** Positive = working capital grew (a cash drain). */
  readonly change_in_working_capital: number | null;
  readonly tax_rate: number | null;
  /** Diluted weighted-average shares. */
  readonly shares_outstanding: number | null;
  readonly total_debt: number | null;
  readonly cash_and_equivalents: number | null;
  readonly interest_expense: number | null;
}

export interface MarketQuote {
  ticker: string;
  company_name: string;
  price: number | null;
  market_cap: number | null;
  beta: number | null;
  currency: string;
}

export interface CompanyBundle {
  ticker: string;
  /** Most recent first. */
  statements: FinancialStatement[];
  period: StatementPeriod;
  quote: MarketQuote;
  cache_used: boolean;
}

export type GrowthSchedule =
  | { kind: 'flat'; rate: number }
  | { kind: 'staged'; rates: number[] };

export interface ProjectionAssumptions {
  growth: GrowthSchedule;
  discount_rate: number;
  terminal_growth: number;
  horizon_years: number;
}

export interface ProjectedYear {
  year: number;
  growth_rate: number;
  fcf: number;
  discount_factor: number;
  present_value: number;
}

export type CashFlowProjection = ProjectedYear[];

export type Verdict = 'undervalued' | 'fairly valued' | 'overvalued';

export interface ValuationResult {
  assumptions: ProjectionAssumptions;
  statement_date: string;
  base_fcf: number;
  projection: CashFlowProjection;
  pv_forecast: number;
  terminal_value: number;
  pv_terminal: number;
  enterprise_value_ev: number;
  net_debt: number;
  equity_value: number;
  value_per_share: number;
  market_price: number | null;
  upside_vs_spot: number | null;
  verdict: Verdict | null;
  warnings: string[];
  limitations: string[];
}

export interface CapitalStructure {
  ticker: string;
  equity_market_value_E: number;
  debt_book_value_D: number;
  cash_and_equivalents: number;
  net_debt: number;
  shares_outstanding: number | null;
  beta: number | null;
  notes: string[];
  limitations: string[];
  warnings: string[];
}

export interface WaccInputs {
  rf: number;
  erp: number;
  beta_override?: number | null;
  kd_override?: number | null;
}

export interface WACCResult {
  rf: number;
  erp: number;
  beta_used: number;
  cost_of_equity_ke: number;
  tax_rate_effective: number;
  cost_of_debt_kd: number;
  weights: {
    w_e: number;
    w_d: number;
  };
  wacc: number;
  warnings: string[];
  limitations: string[];
  components: {
    equity_market_value_E: number;
    debt_book_value_D: number;
  };
}

export interface ScenarioSensitivity {
  scenarios: {
    base: ValuationResult;
    bull: ValuationResult;
    bear: ValuationResult;
  };
  sensitivity: {
    wacc_values: number[];
    g_values: number[];
    /** Rows follow wacc_values, columns g_values; null where WACC <= g. */
    value_per_share_matrix: (number | null)[][];
  };
  warnings: string[];
  limitations: string[];
}

export type SensitivityVariable = 'growth' | 'discount_rate' | 'terminal_growth';

export type SensitivityStep =
  | { label: string; value: number; ok: true; result: ValuationResult }
  | { label: string; value: number; ok: false; error: string };

export type HistoricalValuation =
  | { date: string; ok: true; result: ValuationResult }
  | { date: string; ok: false; error: string };

export interface AnalystContext {
  meta: Meta;
  inputs: {
    ticker: string;
    horizon_years: number;
    growth: GrowthSchedule;
    discount_rate: number;
    terminal_growth: number;
  };
  capital_structure: CapitalStructure;
  wacc: WACCResult | null;
  valuation: ValuationResult;
  sensitivity: ScenarioSensitivity | null;
  limitations: string[];
  warnings: string[];
}
