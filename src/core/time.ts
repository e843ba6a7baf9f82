const DAY_MS = 86400000;

export const formatISODate = (date: Date): string => date.toISOString().slice(0, 10);

export const parseAsOf = (asOf?: string): Date => {
  if (!asOf) return new Date();
  const parsed = new Date(asOf);
  if (Number.isNaN(parsed.getTime())) {
    throw new Error(`Invalid asOf date: ${asOf}`);
  }
  return parsed;
};

// Whole calendar days between the as-of date and an expiration, both taken at UTC midnight.
export const daysToExpiration = (expiration: string, asOf: Date): number => {
  const exp = Date.parse(`${expiration}T00:00:00Z`);
  if (Number.isNaN(exp)) return 0;
  const start = Date.parse(`${formatISODate(asOf)}T00:00:00Z`);
  return Math.round((exp - start) / DAY_MS);
};

const MONTHS = ['Jan', 'Feb', 'Mar', 'Apr', 'May', 'Jun', 'Jul', 'Aug', 'Sep', 'Oct', 'Nov', 'Dec'];

export const formatShortDate = (isoDate: string): string => {
  const [, month, day] = isoDate.split('-');
  const idx = Number(month) - 1;
  if (!MONTHS[idx] || !day) return isoDate;
  return `${MONTHS[idx]} ${day}`;
};
