import { OptionRight } from '../core/types';

export interface ParsedOptionSymbol {
  underlying: string;
  expiration: string; // YYYY-MM-DD
  right: OptionRight;
  strike: number;
}

// Root, at least one space of padding, YYMMDD, C|P, strike x1000 in eight digits.
const OCC_PATTERN = /^(\S+?)\s+(\d{2})(\d{2})(\d{2})([CP])(\d{8})$/;

const isCalendarDate = (year: number, month: number, day: number): boolean => {
  if (month < 1 || month > 12 || day < 1) return false;
  const d = new Date(Date.UTC(year, month - 1, day));
  return d.getUTCFullYear() === year && d.getUTCMonth() === month - 1 && d.getUTCDate() === day;
};

export const parseOptionSymbol = (identifier: string): ParsedOptionSymbol | null => {
  const match = OCC_PATTERN.exec(identifier);
  if (!match) return null;
  const [, root, yy, mm, dd, cp, strikeDigits] = match;
  const year = 2000 + Number(yy);
  const month = Number(mm);
  const day = Number(dd);
  if (!isCalendarDate(year, month, day)) return null;
  return {
    underlying: root,
    expiration: `${year}-${mm}-${dd}`,
    right: cp === 'C' ? 'call' : 'put',
    strike: Number(strikeDigits) / 1000
  };
};

export const formatOptionSymbol = (parts: ParsedOptionSymbol): string => {
  const [year, month, day] = parts.expiration.split('-');
  const strike = String(Math.round(parts.strike * 1000)).padStart(8, '0');
  const root = parts.underlying.padEnd(Math.max(6, parts.underlying.length + 1), ' ');
  return `${root}${year.slice(2)}${month}${day}${parts.right === 'call' ? 'C' : 'P'}${strike}`;
};
