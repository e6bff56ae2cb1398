import type { EarningsPeriod } from '@parkalot/shared';

const MONTHS = ['Jan', 'Feb', 'Mar', 'Apr', 'May', 'Jun', 'Jul', 'Aug', 'Sep', 'Oct', 'Nov', 'Dec'];

const DAY_MS = 24 * 60 * 60 * 1000;

/** ISO 8601 week-numbering year and week of a calendar day. */
export function isoWeek(day: Date): { year: number; week: number } {
  const thursday = new Date(Date.UTC(day.getUTCFullYear(), day.getUTCMonth(), day.getUTCDate()));
  thursday.setUTCDate(thursday.getUTCDate() + 3 - ((thursday.getUTCDay() + 6) % 7));
  const year = thursday.getUTCFullYear();
  const dayOfYear = Math.round((thursday.getTime() - Date.UTC(year, 0, 1)) / DAY_MS);
  return { year, week: Math.floor(dayOfYear / 7) + 1 };
}

/**
 * Display label for a reporting period starting on `periodStart` (YYYY-MM-DD):
 * `2030 W23`, `Jun 2030` or `2030`.
 */
export function periodLabel(period: EarningsPeriod, periodStart: string): string {
  const [year, month, day] = periodStart.split('-').map(Number);
  switch (period) {
    case 'year':
      return String(year);
    case 'month':
      return `${MONTHS[month - 1]} ${year}`;
    case 'week': {
      const iso = isoWeek(new Date(Date.UTC(year, month - 1, day)));
      return `${iso.year} W${String(iso.week).padStart(2, '0')}`;
    }
  }
}
