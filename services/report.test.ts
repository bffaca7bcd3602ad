import { describe, expect, it } from 'vitest';
import { flatAssumptions, makeBundle, makeStatement } from './__fixtures__/company';
import {
  estimate_wacc,
  extract_capital_structure,
  run_historical_dcf,
  run_scenarios_and_sensitivity,
  run_step_sensitivity,
} from './analystTools';
import { run_fcff_dcf } from './dcfEngine';
import {
  describe_growth,
  format_cache_info,
  format_cash_flow_chart,
  format_historical,
  format_money,
  format_percent,
  format_price,
  format_projection_table,
  format_report,
  format_sensitivity,
  format_step_sensitivity,
  format_wacc,
} from './report';

const valued = (price: number | null = 5, statement = makeStatement()) =>
  run_fcff_dcf(statement, flatAssumptions(), price);

describe('number formatting', () => {
  it('formats rates as percentages', () => {
    expect(format_percent(0.5960429018851169, true)).toBe('+59.60%');
    expect(format_percent(-0.2, true)).toBe('-20.00%');
    expect(format_percent(0.03)).toBe('3.00%');
  });

  it('formats prices with two decimals', () => {
    expect(format_price(7.9802145094255845)).toBe('$7.98');
    expect(format_price(1234.5)).toBe('$1,234.50');
    expect(format_price(5, 'EUR')).toBe('€5.00');
  });

  it('describes growth schedules', () => {
    expect(describe_growth({ kind: 'flat', rate: 0.03 })).toBe('3.00% flat');
    expect(describe_growth({ kind: 'staged', rates: [0.1, 0.05] })).toBe('staged 10.00% > 5.00%');
  });
});

describe('format_projection_table', () => {
  it('labels years after the statement year', () => {
    const result = valued();
    const rows = format_projection_table(result).split('\n');

    expect(rows).toHaveLength(7);
    expect(rows[0].split('|').map((c) => c.trim())).toEqual(['Year', 'Growth', 'FCF', 'Discount', 'PV']);
    expect(rows[2].split(' | ').map((c) => c.trim())).toEqual([
      '2025',
      '3.00%',
      format_money(result.projection[0].fcf),
      '0.9091',
      format_money(result.projection[0].present_value),
    ]);
    expect(rows[6].trim().startsWith('2029')).toBe(true);
  });
});

describe('format_report', () => {
  it('summarises the valuation against the market', () => {
    const lines = format_report(makeBundle(), valued()).split('\n');

    expect(lines[0]).toBe('DCF valuation: Test Co (TEST)');
    expect(lines).toContain('Statement date: 2024-12-31');
    expect(lines).toContain('Assumptions: horizon 5y, growth 3.00% flat, discount 10.00%, terminal growth 2.00%');
    expect(lines).toContain('Intrinsic value per share: $7.98');
    expect(lines).toContain('Market price: $5.00');
    expect(lines[lines.length - 1]).toBe('Upside vs market: +59.60% (undervalued)');
  });

  it('flags a valuation built on a quarterly statement', () => {
    const lines = format_report(makeBundle({ period: 'quarter' }), valued()).split('\n');
    expect(lines[2]).toBe('Statement date: 2024-12-31 (quarterly figures, not annualised)');
  });

  it('omits the comparison without a market price', () => {
    const bundle = makeBundle();
    const lines = format_report({ ...bundle, quote: { ...bundle.quote, price: null } }, valued(null)).split('\n');

    expect(lines[lines.length - 1]).toBe('Market price: unavailable');
    expect(lines.some((l) => l.startsWith('Upside'))).toBe(false);
  });

  it('lists warnings last', () => {
    const lines = format_report(makeBundle(), valued(5, makeStatement({ total_debt: null }))).split('\n');
    expect(lines.slice(-2)).toEqual(['Warnings:', '  - Total debt not reported; treated as zero in net debt']);
  });
});

describe('format_cash_flow_chart', () => {
  it('scales bars to the largest cash flow', () => {
    const result = valued();
    const lines = format_cash_flow_chart(result).split('\n');

    expect(lines).toHaveLength(11);
    expect(lines[0]).toBe('Projected free cash flow (█ FCF, ▒ present value)');
    expect(lines[1]).toBe(`2025 ${'█'.repeat(36)} ${format_money(result.projection[0].fcf)}`);
    expect(lines[2]).toBe(`     ${'▒'.repeat(32)} ${format_money(result.projection[0].present_value)}`);
    expect(lines[9]).toBe(`2029 ${'█'.repeat(40)} ${format_money(result.projection[4].fcf)}`);
    expect(lines[10]).toBe(`     ${'▒'.repeat(25)} ${format_money(result.projection[4].present_value)}`);
  });

  it('honours a narrower width', () => {
    const lines = format_cash_flow_chart(valued(), 10).split('\n');
    expect(lines[9].startsWith(`2029 ${'█'.repeat(10)} `)).toBe(true);
  });
});

describe('format_wacc', () => {
  it('shows each component', () => {
    const statement = makeStatement({ total_debt: 200, interest_expense: 10 });
    const bundle = makeBundle({ statements: [statement] });
    const wacc = estimate_wacc(extract_capital_structure(bundle), statement, { rf: 0.04, erp: 0.05 });
    const lines = format_wacc(wacc).split('\n');

    expect(lines).toEqual([
      'WACC (CAPM)',
      '-'.repeat(60),
      'Cost of equity: 10.00% (rf 4.00%, beta 1.2, ERP 5.00%)',
      'Cost of debt: 5.00% pre-tax, tax rate 25.00%',
      'Weights: equity 80.00%, debt 20.00%',
      'WACC: 8.75%',
    ]);
  });
});

describe('format_sensitivity', () => {
  it('renders scenarios and the grid', () => {
    const lines = format_sensitivity(run_scenarios_and_sensitivity(makeStatement(), flatAssumptions(), 5)).split('\n');

    expect(lines.slice(0, 2)).toEqual(['Scenarios', '-'.repeat(60)]);
    expect(lines[3]).toBe('Base  WACC 10.00%, growth 3.00% flat: $7.98 (+59.60%)');
    expect(lines[7]).toBe(
      ['WACC \\ g'.padEnd(9), ...['1.50%', '2.00%', '2.50%'].map((g) => g.padStart(10))].join(' '),
    );
    expect(lines).toHaveLength(13);
    expect(lines[10].startsWith('10.00%   ')).toBe(true);
    expect(lines[10]).toContain('$7.98');
  });

  it('marks impossible cells', () => {
    const out = format_sensitivity(
      run_scenarios_and_sensitivity(makeStatement(), flatAssumptions({ discount_rate: 0.03, terminal_growth: 0.025 }), null),
    );
    expect(out).toContain('n/a');
    expect(out.split('\n').slice(-2)).toEqual([
      '  - Bull-case WACC held at 0.0300 to stay above terminal growth',
      '  - Sensitivity cells with WACC <= terminal growth are left empty',
    ]);
  });
});

describe('format_step_sensitivity', () => {
  it('shows each step and failures', () => {
    const ok = format_step_sensitivity(run_step_sensitivity(makeStatement(), flatAssumptions(), 'discount_rate', 0.1, 1));
    expect(ok.split('\n')[2]).toBe('discount_rate: 0.1100 -> $7.09');

    const failed = format_step_sensitivity(
      run_step_sensitivity(makeStatement(), flatAssumptions({ terminal_growth: 0.08 }), 'terminal_growth', 0.1, 3),
    );
    expect(failed.split('\n')[4]).toMatch(/^terminal_growth: 0\.1040 -> failed: Discount rate \(0\.1\) must be greater/);
  });
});

describe('format_historical', () => {
  it('prints one line per period', () => {
    const history = run_historical_dcf(
      [makeStatement(), makeStatement({ date: '2023-12-31', tax_rate: null })],
      flatAssumptions(),
      5,
      2,
    );
    const [ok] = history;
    const lines = format_historical(history).split('\n');

    expect(lines[2]).toBe(
      `2024-12-31: $7.98 per share (EV ${format_money(ok.ok ? ok.result.enterprise_value_ev : 0)})`,
    );
    expect(lines[3]).toBe('2023-12-31: skipped (Statement dated 2023-12-31 is missing required field(s): tax_rate)');
  });
});

describe('format_cache_info', () => {
  it('reports an empty cache', () => {
    expect(
      format_cache_info({ cache_directory: '.cache', total_files: 0, total_size_bytes: 0, files: [] }),
    ).toBe('Cache directory: .cache\nTotal files: 0\nTotal size: 0.00 MB\nNo cached files found.');
  });

  it('lists valid, stale and unreadable files', () => {
    const out = format_cache_info({
      cache_directory: '.cache',
      total_files: 3,
      total_size_bytes: 300,
      files: [
        {
          file: 'AAPL_profile.json',
          ticker: 'AAPL',
          resource: 'profile',
          cached_at: '2025-01-01T00:00:00.000Z',
          size_bytes: 120,
          is_valid: true,
        },
        {
          file: 'MSFT_profile.json',
          ticker: 'MSFT',
          resource: 'profile',
          cached_at: '2024-01-01T00:00:00.000Z',
          size_bytes: 100,
          is_valid: false,
        },
        {
          file: 'bad.json',
          ticker: null,
          resource: null,
          cached_at: null,
          size_bytes: 80,
          is_valid: false,
          error: 'Unexpected token',
        },
      ],
    });

    expect(out.split('\n').slice(3)).toEqual([
      'Cached files:',
      '  ✓ AAPL_profile.json (AAPL - profile), cached 2025-01-01T00:00:00.000Z, 120 bytes',
      '  ✗ MSFT_profile.json (MSFT - profile), cached 2024-01-01T00:00:00.000Z, 100 bytes',
      '  ! bad.json: Unexpected token',
    ]);
  });
});
