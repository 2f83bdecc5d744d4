const integerFormat = new Intl.NumberFormat('en-US', { maximumFractionDigits: 0 })

export function fmtInt(n: number): string {
  return integerFormat.format(n)
}

export function fmtMoney(n: number): string {
  return n < 0 ? `-$${fmtInt(-n)}` : `$${fmtInt(n)}`
}

export function fmtPct(n: number): string {
  return `${(n * 100).toFixed(1)}%`
}
