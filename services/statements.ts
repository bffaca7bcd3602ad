import { z } from 'zod';
import type { FinancialStatement, MarketQuote } from '../types';

// FMP omits or nulls figures it has no value for; keep that distinction.
const figure = z.number().nullable().optional().transform((v) => (v === undefined ? null : v));

export const IncomeRecordSchema = z.object({
  date: z.string(),
  calendarYear: z.union([z.string(), z.number()]).optional(),
  revenue: figure,
  operatingIncome: figure,
  incomeTaxExpense: figure,
  incomeBeforeTax: figure,
  interestExpense: figure,
  depreciationAndAmortization: figure,
  weightedAverageShsOutDil: figure,
});

export const BalanceRecordSchema = z.object({
  date: z.string(),
  totalDebt: figure,
  cashAndCashEquivalents: figure,
});

export const CashFlowRecordSchema = z.object({
  date: z.string(),
  depreciationAndAmortization: figure,
  capitalExpenditure: figure,
  changeInWorkingCapital: figure,
});

export const ProfileRecordSchema = z.object({
  symbol: z.string(),
  companyName: z.string().nullable().optional(),
  price: figure,
  mktCap: figure,
  beta: figure,
  currency: z.string().nullable().optional(),
});

export type IncomeRecord = z.infer<typeof IncomeRecordSchema>;
export type BalanceRecord = z.infer<typeof BalanceRecordSchema>;
export type CashFlowRecord = z.infer<typeof CashFlowRecordSchema>;
export type ProfileRecord = z.infer<typeof ProfileRecordSchema>;

export const effective_tax_rate = (tax: number | null, pre_tax: number | null): number | null => {
  if (tax === null || pre_tax === null || pre_tax === 0) return null;
  return Math.min(1, Math.max(0, tax / pre_tax));
};

const negate = (v: number | null) => (v === null || v === 0 ? v : -v);

/** Newest first. ISO dates sort lexically. */
export const sort_recent_first = <T extends { date: string }>(rows: T[]): T[] =>
  [...rows].sort((a, b) => (a.date < b.date ? 1 : a.date > b.date ? -1 : 0));

/**
 * Joins the three statements on period date. A period needs both an income
 * and a cash-flow record to be kept; the balance sheet only feeds net debt.
 */
export const merge_statements = (
  income: IncomeRecord[],
  balance: BalanceRecord[],
  cashflow: CashFlowRecord[],
): FinancialStatement[] => {
  const balanceByDate = new Map(balance.map((b) => [b.date, b]));
  const cashByDate = new Map(cashflow.map((c) => [c.date, c]));

  const merged: FinancialStatement[] = [];
  for (const inc of income) {
    const cf = cashByDate.get(inc.date);
    if (!cf) continue;
    const bs = balanceByDate.get(inc.date);

    merged.push(
      Object.freeze({
        date: inc.date,
        fiscal_year: inc.calendarYear !== undefined ? String(inc.calendarYear) : inc.date.slice(0, 4),
        revenue: inc.revenue,
        operating_income: inc.operatingIncome,
        depreciation_amortization: cf.depreciationAndAmortization ?? inc.depreciationAndAmortization,
        // FMP reports capex as a negative cash flow.
        capital_expenditure: cf.capitalExpenditure === null ? null : Math.abs(cf.capitalExpenditure),
        // ...and working-capital change as its cash impact (negative = WC grew).
        change_in_working_capital: negate(cf.changeInWorkingCapital),
        tax_rate: effective_tax_rate(inc.incomeTaxExpense, inc.incomeBeforeTax),
        shares_outstanding: inc.weightedAverageShsOutDil,
        total_debt: bs ? bs.totalDebt : null,
        cash_and_equivalents: bs ? bs.cashAndCashEquivalents : null,
        interest_expense: inc.interestExpense,
      }),
    );
  }

  return sort_recent_first(merged);
};

const CURRENCY_CODE = /^[A-Za-z]{3}$/;

export const to_market_quote = (profile: ProfileRecord): MarketQuote => ({
  ticker: profile.symbol,
  company_name: profile.companyName || profile.symbol,
  price: profile.price,
  market_cap: profile.mktCap,
  beta: profile.beta,
  // Intl rejects anything but an ISO 4217 code.
  currency: profile.currency && CURRENCY_CODE.test(profile.currency) ? profile.currency.toUpperCase() : 'USD',
});
