import type {
  AnalystContext,
  CompanyBundle,
  HistoricalValuation,
  ProjectionAssumptions,
  ScenarioSensitivity,
  SensitivityStep,
  SensitivityVariable,
  StatementPeriod,
  ValuationResult,
  WACCResult,
  WaccInputs,
} from '../types';
import {
  build_context_json,
  estimate_wacc,
  extract_capital_structure,
  run_historical_dcf,
  run_scenarios_and_sensitivity,
  run_step_sensitivity,
} from './analystTools';
import type { DataProvider } from './dataProvider';
import { run_fcff_dcf } from './dcfEngine';
import { ConfigurationError } from './errors';
import { createLogger } from './logger';
import {
  format_cash_flow_chart,
  format_historical,
  format_report,
  format_sensitivity,
  format_step_sensitivity,
  format_wacc,
} from './report';

const log = createLogger('pipeline');

export interface ValuationRequest {
  ticker: string;
  assumptions: ProjectionAssumptions;
  wacc?: WaccInputs | null;
  /** Years of history; quarterly statements give four periods per year. */
  history?: number | null;
  interval?: StatementPeriod;
  sensitivity?: boolean;
  step?: { variable: SensitivityVariable; step_increase: number; steps: number } | null;
  chart?: boolean;
  memo?: boolean;
}

export interface PipelineDeps {
  provider: DataProvider;
  writeMemo?: (context: AnalystContext) => Promise<string>;
}

export interface ValuationRun {
  bundle: CompanyBundle;
  assumptions: ProjectionAssumptions;
  wacc: WACCResult | null;
  valuation: ValuationResult;
  sensitivity: ScenarioSensitivity | null;
  steps: SensitivityStep[] | null;
  history: HistoricalValuation[] | null;
  memo: string | null;
  report: string;
}

/** Fetch, value and render one ticker. Every failure propagates to the caller. */
export const run_valuation = async (request: ValuationRequest, deps: PipelineDeps): Promise<ValuationRun> => {
  if (request.memo && !deps.writeMemo) {
    throw new ConfigurationError('Memo requested but no memo writer is configured');
  }

  const bundle = await deps.provider.fetchCompanyBundle(request.ticker, request.interval ?? 'annual');
  const latest = bundle.statements[0];
  const ccy = bundle.quote.currency;
  log.info(`Valuing ${bundle.ticker} on the statement dated ${latest.date}`);

  const capital = extract_capital_structure(bundle);
  let wacc: WACCResult | null = null;
  let assumptions = request.assumptions;
  if (request.wacc) {
    wacc = estimate_wacc(capital, latest, request.wacc);
    assumptions = { ...assumptions, discount_rate: wacc.wacc };
    log.info(`Discount rate set to CAPM WACC ${wacc.wacc}`);
  }

  const valuation = run_fcff_dcf(latest, assumptions, bundle.quote.price);
  const sections = [format_report(bundle, valuation)];
  if (wacc) sections.push(format_wacc(wacc));
  if (request.chart) sections.push(format_cash_flow_chart(valuation, 40, ccy));

  const sensitivity = request.sensitivity
    ? run_scenarios_and_sensitivity(latest, assumptions, bundle.quote.price)
    : null;
  if (sensitivity) sections.push(format_sensitivity(sensitivity, ccy));

  const steps = request.step
    ? run_step_sensitivity(
        latest,
        assumptions,
        request.step.variable,
        request.step.step_increase,
        request.step.steps,
        bundle.quote.price,
      )
    : null;
  if (steps) sections.push(format_step_sensitivity(steps, ccy));

  const periodsPerYear = bundle.period === 'quarter' ? 4 : 1;
  const history = request.history
    ? run_historical_dcf(bundle.statements, assumptions, bundle.quote.price, request.history * periodsPerYear)
    : null;
  if (history) sections.push(format_historical(history, ccy));

  let memo: string | null = null;
  if (request.memo && deps.writeMemo) {
    const context = build_context_json(bundle, assumptions, capital, wacc, valuation, sensitivity);
    memo = await deps.writeMemo(context);
    sections.push(memo);
  }

  return {
    bundle,
    assumptions,
    wacc,
    valuation,
    sensitivity,
    steps,
    history,
    memo,
    report: sections.join('\n\n'),
  };
};
