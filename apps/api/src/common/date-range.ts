const DAY_MS = 24 * 60 * 60 * 1000;

const startOfDayUtc = (value: Date) => Date.UTC(value.getUTCFullYear(), value.getUTCMonth(), value.getUTCDate());

/** Whole UTC calendar days from `from` to `to`; negative when `to` is earlier. */
export const daysBetweenUtc = (from: Date, to: Date) =>
  Math.round((startOfDayUtc(to) - startOfDayUtc(from)) / DAY_MS);

export const toIsoDate = (value: Date) => value.toISOString().slice(0, 10);

/** Parses `YYYY-MM-DD` (as stored in date columns) into UTC midnight. */
export const parseIsoDate = (value: string) => {
  const parsed = new Date(`${value.slice(0, 10)}T00:00:00.000Z`);
  if (Number.isNaN(parsed.valueOf())) {
    throw new RangeError(`Invalid date: ${value}`);
  }
  return parsed;
};
