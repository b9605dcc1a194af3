const twoDecimals = new Intl.NumberFormat('en-US', {
  minimumFractionDigits: 2,
  maximumFractionDigits: 2,
});

const wholeNumber = new Intl.NumberFormat('en-US', {
  maximumFractionDigits: 0,
});

export const formatCurrency = (value: number): string =>
  `$${twoDecimals.format(value)}`;

export const formatPercent = (value: number): string => `${value.toFixed(2)}%`;

export const formatInteger = (value: number): string =>
  wholeNumber.format(value);

export const formatDecimal = (value: number): string => value.toFixed(2);

export const formatDate = (timestamp: number): string =>
  new Date(timestamp).toISOString().slice(0, 10);

// Axis ticks: $1.2k, $3.4M
export const formatAxisCurrency = (value: number): string => {
  const abs = Math.abs(value);
  if (abs >= 1_000_000) {
    return `$${(value / 1_000_000).toFixed(1)}M`;
  }
  if (abs >= 1_000) {
    return `$${(value / 1_000).toFixed(1)}k`;
  }
  return `$${value}`;
};
