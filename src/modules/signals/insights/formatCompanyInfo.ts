/**
 * Company basic-information lines
 * 
 * Pass-through display of an already-retrieved metadata record; fields the
 * record lacks read "N/A".
 */

export const COMPANY_INFO_FIELDS = [
  { label: 'Company Name', key: 'longName' },
  { label: 'Sector', key: 'sector' },
  { label: 'Industry', key: 'industry' },
  { label: 'Market Cap', key: 'marketCap' },
  { label: 'P/E Ratio', key: 'trailingPE' },
  { label: 'Dividend Yield', key: 'dividendYield' },
  { label: '52-Week High', key: 'fiftyTwoWeekHigh' },
  { label: '52-Week Low', key: 'fiftyTwoWeekLow' },
] as const;

export const COMPANY_INFO_NOTES: Record<string, string> = {
  'Market Cap': "Indicates the company's total market value, helping assess its size.",
  'P/E Ratio':
    'A valuation metric comparing the stock price to its earnings; useful for comparing companies within the same industry.',
  'Dividend Yield':
    'Shows how much a company pays out in dividends each year relative to its stock price.',
};

function formatInfoValue(value: unknown): string {
  if (typeof value === 'string') {
    return value.trim() === '' ? 'N/A' : value;
  }
  if (typeof value === 'number' && Number.isFinite(value)) {
    return String(value);
  }
  return 'N/A';
}

export function formatCompanyInfo(info: Record<string, unknown>): string[] {
  return COMPANY_INFO_FIELDS.map(({ label, key }) => `${label}: ${formatInfoValue(info[key])}`);
}
