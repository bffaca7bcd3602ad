import { describe, expect, it } from 'vitest';
import { fmpBalance, fmpCashFlow, fmpIncome, fmpProfile } from './__fixtures__/company';
import {
  BalanceRecordSchema,
  CashFlowRecordSchema,
  IncomeRecordSchema,
  ProfileRecordSchema,
  effective_tax_rate,
  merge_statements,
  sort_recent_first,
  to_market_quote,
} from './statements';

const income = IncomeRecordSchema.array().parse(fmpIncome);
const balance = BalanceRecordSchema.array().parse(fmpBalance);
const cashflow = CashFlowRecordSchema.array().parse(fmpCashFlow);

describe('effective_tax_rate', () => {
  it('divides tax by pre-tax income', () => {
    expect(effective_tax_rate(25, 100)).toBe(0.25);
  });

  it('is unknown without pre-tax income', () => {
    expect(effective_tax_rate(25, 0)).toBeNull();
    expect(effective_tax_rate(null, 100)).toBeNull();
    expect(effective_tax_rate(25, null)).toBeNull();
  });

  it('clamps to between zero and one', () => {
    expect(effective_tax_rate(-10, 100)).toBe(0);
    expect(effective_tax_rate(150, 100)).toBe(1);
  });
});

describe('record schemas', () => {
  it('maps absent figures to null', () => {
    const [row] = IncomeRecordSchema.array().parse([{ date: '2024-12-31', revenue: null }]);
    expect(row.revenue).toBeNull();
    expect(row.operatingIncome).toBeNull();
    expect(row.calendarYear).toBeUndefined();
  });

  it('rejects figures that are not numbers', () => {
    expect(IncomeRecordSchema.safeParse({ date: '2024-12-31', revenue: 'n/a' }).success).toBe(false);
  });
});

describe('merge_statements', () => {
  it('joins the three statements per period, newest first', () => {
    const merged = merge_statements(income, balance, cashflow);

    expect(merged.map((s) => s.date)).toEqual(['2024-12-31', '2023-12-31']);
    expect(merged[0]).toEqual({
      date: '2024-12-31',
      fiscal_year: '2024',
      revenue: 1000,
      operating_income: 100,
      depreciation_amortization: 10,
      capital_expenditure: 20,
      change_in_working_capital: 5,
      tax_rate: 0.25,
      shares_outstanding: 100,
      total_debt: 50,
      cash_and_equivalents: 30,
      interest_expense: 5,
    });
  });

  it('reads a working-capital release as a negative increase', () => {
    const [, older] = merge_statements(income, balance, cashflow);
    expect(older.change_in_working_capital).toBe(-2);
    expect(older.capital_expenditure).toBe(18);
    expect(older.tax_rate).toBe(0.2);
  });

  it('keeps a zero working-capital change as zero', () => {
    const flat = cashflow.map((c) => ({ ...c, changeInWorkingCapital: 0 }));
    const [latest] = merge_statements(income, balance, flat);
    expect(latest.change_in_working_capital).toBe(0);
  });

  it('drops periods without a cash-flow statement', () => {
    const merged = merge_statements(income, balance, cashflow.slice(0, 1));
    expect(merged.map((s) => s.date)).toEqual(['2024-12-31']);
  });

  it('leaves net-debt figures empty without a balance sheet', () => {
    const [latest] = merge_statements(income, [], cashflow);
    expect(latest.total_debt).toBeNull();
    expect(latest.cash_and_equivalents).toBeNull();
  });

  it('falls back to the income statement D&A and the date for the year', () => {
    const noDa = cashflow.map((c) => ({ ...c, depreciationAndAmortization: null }));
    const undated = income.map((i) => ({ ...i, calendarYear: undefined }));
    const [latest] = merge_statements(undated, balance, noDa);
    expect(latest.depreciation_amortization).toBe(10);
    expect(latest.fiscal_year).toBe('2024');
  });

  it('returns frozen statements', () => {
    const [latest] = merge_statements(income, balance, cashflow);
    expect(Object.isFrozen(latest)).toBe(true);
  });
});

describe('sort_recent_first', () => {
  it('orders ISO dates descending without mutating the input', () => {
    const rows = [{ date: '2021-06-30' }, { date: '2023-06-30' }, { date: '2022-06-30' }];
    expect(sort_recent_first(rows).map((r) => r.date)).toEqual(['2023-06-30', '2022-06-30', '2021-06-30']);
    expect(rows[0].date).toBe('2021-06-30');
  });
});

describe('to_market_quote', () => {
  it('maps the profile fields', () => {
    const [profile] = ProfileRecordSchema.array().parse(fmpProfile);
    expect(to_market_quote(profile)).toEqual({
      ticker: 'TEST',
      company_name: 'Test Co',
      price: 5,
      market_cap: 800,
      beta: 1.2,
      currency: 'USD',
    });
  });

  it('falls back to USD for a blank or malformed currency', () => {
    const quote = (currency: string) => to_market_quote(ProfileRecordSchema.parse({ symbol: 'XYZ', currency }));
    expect(quote('').currency).toBe('USD');
    expect(quote('US Dollar').currency).toBe('USD');
    expect(quote('eur').currency).toBe('EUR');
  });

  it('defaults the name and currency', () => {
    const profile = ProfileRecordSchema.parse({ symbol: 'XYZ', price: 1 });
    expect(to_market_quote(profile)).toMatchObject({ company_name: 'XYZ', currency: 'USD', beta: null });
  });
});
