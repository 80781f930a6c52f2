/**
 * Formats a monthly rent estimate in whole dollars, e.g. `$2,745/mo`.
 */
export const formatRent = (value: number): string => {
  if (!isFinite(value)) return "";
  const dollars = new Intl.NumberFormat("en-US", {
    style: "currency",
    currency: "USD",
    maximumFractionDigits: 0,
  }).format(Math.round(value));
  return `${dollars}/mo`;
};
