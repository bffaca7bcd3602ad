import type { CompanyBundle, FinancialStatement, ProjectionAssumptions } from '../../types';

// EBIT 100, tax 25%, D&A 10, capex 20, WC +5 => base FCF 60.
export const makeStatement = (overrides: Partial<FinancialStatement> = {}): FinancialStatement => ({
  date: '2024-12-31',
  fiscal_year: '2024',
  revenue: 1000,
  operating_income: 100,
  depreciation_amortization: 10,
  capital_expenditure: 20,
  change_in_working_capital: 5,
  tax_rate: 0.25,
  shares_outstanding: 100,
  total_debt: 0,
  cash_and_equivalents: 0,
  interest_expense: 0,
  ...overrides,
});

export const flatAssumptions = (overrides: Partial<ProjectionAssumptions> = {}): ProjectionAssumptions => ({
  growth: { kind: 'flat', rate: 0.03 },
  discount_rate: 0.1,
  terminal_growth: 0.02,
  horizon_years: 5,
  ...overrides,
});

export const makeBundle = (overrides: Partial<CompanyBundle> = {}): CompanyBundle => ({
  ticker: 'TEST',
  statements: [makeStatement(), makeStatement({ date: '2023-12-31', fiscal_year: '2023' })],
  period: 'annual',
  quote: {
    ticker: 'TEST',
    company_name: 'Test Co',
    price: 5,
    market_cap: 800,
    beta: 1.2,
    currency: 'USD',
  },
  cache_used: false,
  ...overrides,
});

// Raw provider payloads, two annual periods returned out of order.
export const fmpIncome = [
  {
    date: '2023-12-31',
    calendarYear: '2023',
    revenue: 900,
    operatingIncome: 90,
    incomeTaxExpense: 18,
    incomeBeforeTax: 90,
    interestExpense: 4,
    depreciationAndAmortization: 9,
    weightedAverageShsOutDil: 100,
  },
  {
    date: '2024-12-31',
    calendarYear: '2024',
    revenue: 1000,
    operatingIncome: 100,
    incomeTaxExpense: 25,
    incomeBeforeTax: 100,
    interestExpense: 5,
    depreciationAndAmortization: 10,
    weightedAverageShsOutDil: 100,
  },
];

export const fmpBalance = [
  { date: '2024-12-31', totalDebt: 50, cashAndCashEquivalents: 30 },
  { date: '2023-12-31', totalDebt: 60, cashAndCashEquivalents: 20 },
];

export const fmpCashFlow = [
  { date: '2024-12-31', depreciationAndAmortization: 10, capitalExpenditure: -20, changeInWorkingCapital: -5 },
  { date: '2023-12-31', depreciationAndAmortization: 9, capitalExpenditure: -18, changeInWorkingCapital: 2 },
];

export const fmpProfile = [
  { symbol: 'TEST', companyName: 'Test Co', price: 5, mktCap: 800, beta: 1.2, currency: 'USD' },
];
