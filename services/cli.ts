import { parseArgs } from 'node:util';
import { z } from 'zod';
import type { ProjectionAssumptions, SensitivityVariable, StatementPeriod, WaccInputs } from '../types';
import { DEFAULT_ASSUMPTIONS, DEFAULT_GROWTH_RATE } from './config';
import { declining_growth } from './dcfEngine';
import { InvalidInputError } from './errors';

export const USAGE = `Usage: dcf-valuator --ticker <SYMBOL> [options]

Valuation
  --horizon <years>           Years to project (1-20, default ${DEFAULT_ASSUMPTIONS.horizon_years})
  --growth <rate>             Flat FCF growth per year (default ${DEFAULT_GROWTH_RATE})
  --growth-end <rate>         Fade growth linearly from --growth to this rate
  --growth-schedule <r1,r2>   Explicit per-year growth rates (last one carries forward)
  --discount-rate <rate>      Discount rate / WACC (0.01-0.50, default ${DEFAULT_ASSUMPTIONS.discount_rate})
  --terminal-growth <rate>    Perpetual growth after the horizon (0-0.10, default ${DEFAULT_ASSUMPTIONS.terminal_growth})
  --risk-free <rate>          With --erp: derive the discount rate from CAPM WACC
  --erp <rate>                Equity risk premium for CAPM
  --beta <value>              Override the provider's beta

Analyses
  --history <n>               Also value the last n years of reported periods (1-10)
  --sensitivity               Bull/bear scenarios and a WACC x terminal growth grid
  --variable <name>           Step sensitivity on growth | discount_rate | terminal_growth
  --step-increase <pct>       Relative increase per step (0.001-1.0)
  --steps <n>                 Number of steps (1-50, default 5)
  --chart                     Bar chart of projected cash flows
  --memo                      Analyst memo via Gemini (needs GEMINI_API_KEY)

Data
  --interval <annual|quarter> Statement period to fetch (default annual)
  --api-key <key>             FMP key (default: FMP_API_KEY / APIKEY)
  --no-cache                  Always fetch fresh data
  --clear-cache               Delete cached responses before running
  --cache-info                Show cache contents and exit
  -h, --help                  Show this help
`;

const VARIABLE_ALIASES = new Map<string, SensitivityVariable>([
  ['growth', 'growth'],
  ['eg', 'growth'],
  ['earnings_growth_rate', 'growth'],
  ['discount', 'discount_rate'],
  ['discount_rate', 'discount_rate'],
  ['terminal_growth', 'terminal_growth'],
  ['pg', 'terminal_growth'],
  ['perpetual_growth_rate', 'terminal_growth'],
]);

const rate = (label: string, min: number, max: number) =>
  z.coerce
    .number({ invalid_type_error: `${label} must be a number` })
    .min(min, `${label} must be between ${min} and ${max}`)
    .max(max, `${label} must be between ${min} and ${max}`);

const count = (label: string, min: number, max: number) =>
  z.coerce
    .number({ invalid_type_error: `${label} must be a number` })
    .int(`${label} must be a whole number`)
    .min(min, `${label} must be between ${min} and ${max}`)
    .max(max, `${label} must be between ${min} and ${max}`);

const RawArgsSchema = z.object({
  ticker: z.string().trim().min(1).optional(),
  horizon: count('Horizon', 1, 20).default(DEFAULT_ASSUMPTIONS.horizon_years),
  growth: rate('Growth', -0.5, 1).optional(),
  'growth-end': rate('Growth end', -0.5, 1).optional(),
  'growth-schedule': z
    .string()
    .transform((s) => s.split(',').map((part) => part.trim()).filter(Boolean))
    .pipe(z.array(rate('Growth schedule entry', -0.5, 1)).min(1, 'Growth schedule needs at least one rate'))
    .optional(),
  'discount-rate': rate('Discount rate', 0.01, 0.5).default(DEFAULT_ASSUMPTIONS.discount_rate),
  'terminal-growth': rate('Terminal growth', 0, 0.1).default(DEFAULT_ASSUMPTIONS.terminal_growth),
  'risk-free': rate('Risk-free rate', 0, 0.2).optional(),
  erp: rate('Equity risk premium', 0, 0.15).optional(),
  beta: rate('Beta', 0, 5).optional(),
  history: count('History', 1, 10).optional(),
  sensitivity: z.boolean().default(false),
  variable: z.string().optional(),
  'step-increase': rate('Step increase', 0.001, 1).optional(),
  steps: count('Steps', 1, 50).default(5),
  chart: z.boolean().default(false),
  memo: z.boolean().default(false),
  interval: z
    .enum(['annual', 'quarter'], { errorMap: () => ({ message: 'Interval must be annual or quarter' }) })
    .default('annual'),
  'api-key': z.string().optional(),
  'no-cache': z.boolean().default(false),
  'clear-cache': z.boolean().default(false),
  'cache-info': z.boolean().default(false),
  help: z.boolean().default(false),
});

export interface CliOptions {
  ticker: string | null;
  assumptions: ProjectionAssumptions;
  wacc: WaccInputs | null;
  history: number | null;
  sensitivity: boolean;
  step: { variable: SensitivityVariable; step_increase: number; steps: number } | null;
  chart: boolean;
  memo: boolean;
  interval: StatementPeriod;
  apiKey: string | undefined;
  useCache: boolean;
  clearCache: boolean;
  cacheInfo: boolean;
  help: boolean;
}

export const parseCliArgs = (argv: string[]): CliOptions => {
  let values: unknown;
  try {
    ({ values } = parseArgs({
      args: argv,
      strict: true,
      allowPositionals: false,
      options: {
        ticker: { type: 'string', short: 't' },
        horizon: { type: 'string' },
        growth: { type: 'string' },
        'growth-end': { type: 'string' },
        'growth-schedule': { type: 'string' },
        'discount-rate': { type: 'string' },
        'terminal-growth': { type: 'string' },
        'risk-free': { type: 'string' },
        erp: { type: 'string' },
        beta: { type: 'string' },
        history: { type: 'string' },
        sensitivity: { type: 'boolean' },
        variable: { type: 'string' },
        'step-increase': { type: 'string' },
        steps: { type: 'string' },
        chart: { type: 'boolean' },
        memo: { type: 'boolean' },
        interval: { type: 'string' },
        'api-key': { type: 'string' },
        'no-cache': { type: 'boolean' },
        'clear-cache': { type: 'boolean' },
        'cache-info': { type: 'boolean' },
        help: { type: 'boolean', short: 'h' },
      },
    }));
  } catch (error) {
    throw new InvalidInputError(error instanceof Error ? error.message : String(error));
  }

  const parsed = RawArgsSchema.safeParse(values);
  if (!parsed.success) {
    throw new InvalidInputError(parsed.error.issues.map((i) => i.message).join('; '));
  }
  const a = parsed.data;

  if (a['growth-schedule'] && (a.growth !== undefined || a['growth-end'] !== undefined)) {
    throw new InvalidInputError('--growth-schedule cannot be combined with --growth or --growth-end');
  }
  const flatRate = a.growth ?? DEFAULT_GROWTH_RATE;
  const growth: ProjectionAssumptions['growth'] = a['growth-schedule']
    ? { kind: 'staged', rates: a['growth-schedule'] }
    : a['growth-end'] !== undefined
      ? declining_growth(flatRate, a['growth-end'], a.horizon)
      : { kind: 'flat', rate: flatRate };

  if ((a['risk-free'] === undefined) !== (a.erp === undefined)) {
    throw new InvalidInputError('--risk-free and --erp must be given together');
  }
  if (a.beta !== undefined && a.erp === undefined) {
    throw new InvalidInputError('--beta only applies together with --risk-free and --erp');
  }
  const wacc: WaccInputs | null =
    a['risk-free'] !== undefined && a.erp !== undefined
      ? { rf: a['risk-free'], erp: a.erp, beta_override: a.beta ?? null }
      : null;

  let step: CliOptions['step'] = null;
  if (a['step-increase'] !== undefined || a.variable !== undefined) {
    if (a['step-increase'] === undefined || a.variable === undefined) {
      throw new InvalidInputError('Step sensitivity needs both --variable and --step-increase');
    }
    const variable = VARIABLE_ALIASES.get(a.variable);
    if (!variable) {
      throw new InvalidInputError(
        `Invalid variable '${a.variable}'. Must choose from: growth, discount_rate, terminal_growth`,
      );
    }
    step = { variable, step_increase: a['step-increase'], steps: a.steps };
  }

  const maintenanceOnly = a['cache-info'] || a.help;
  if (!a.ticker && !maintenanceOnly && !a['clear-cache']) {
    throw new InvalidInputError('--ticker is required');
  }

  return {
    ticker: a.ticker ?? null,
    assumptions: {
      growth,
      discount_rate: a['discount-rate'],
      terminal_growth: a['terminal-growth'],
      horizon_years: a.horizon,
    },
    wacc,
    history: a.history ?? null,
    sensitivity: a.sensitivity,
    step,
    chart: a.chart,
    memo: a.memo,
    interval: a.interval,
    apiKey: a['api-key'],
    useCache: !a['no-cache'],
    clearCache: a['clear-cache'],
    cacheInfo: a['cache-info'],
    help: a.help,
  };
};
