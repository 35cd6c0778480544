// Display formatting. Calculators never round; this is the only place that does.

const thousands = new Intl.NumberFormat('en-US', { maximumFractionDigits: 0 })

export function formatCurrency(amount: number, precision = 2): string {
  if (amount >= 1000) return `$${thousands.format(amount)}`
  return `$${amount.toFixed(precision)}`
}

export function formatNumber(n: number): string {
  return thousands.format(n)
}

export function formatSeconds(seconds: number): string {
  return `${seconds.toFixed(2)}s`
}

export function formatMilliseconds(seconds: number): string {
  return `${(seconds * 1000).toFixed(1)} ms`
}

export function formatThroughput(tokensPerSecond: number): string {
  return `${tokensPerSecond.toFixed(0)} tok/s`
}

/** Signed percentage, e.g. "+12.5%" */
export function formatPercentage(value: number, precision = 1): string {
  const sign = value >= 0 ? '+' : ''
  return `${sign}${value.toFixed(precision)}%`
}

/** Compact token counts: 1.2M, 300.0K, 950 */
export function formatTokens(n: number): string {
  if (n >= 1_000_000) return `${(n / 1_000_000).toFixed(1)}M`
  if (n >= 1_000) return `${(n / 1_000).toFixed(1)}K`
  return String(n)
}
