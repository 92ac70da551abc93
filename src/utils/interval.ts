const WEEK_IN_DAYS = 7;
const MONTH_IN_DAYS = 30;
const YEAR_IN_DAYS = 365;

/** Short label for a review interval in whole days, e.g. `3d`, `2w`, `4mo`. */
export function formatIntervalLabel(days: number): string {
  if (!Number.isFinite(days) || days < 1) {
    return '1d';
  }
  const wholeDays = Math.floor(days);
  if (wholeDays < WEEK_IN_DAYS * 2) {
    return `${wholeDays}d`;
  }
  if (wholeDays < MONTH_IN_DAYS * 2) {
    return `${Math.floor(wholeDays / WEEK_IN_DAYS)}w`;
  }
  if (wholeDays < YEAR_IN_DAYS) {
    return `${Math.floor(wholeDays / MONTH_IN_DAYS)}mo`;
  }
  return `${Math.floor(wholeDays / YEAR_IN_DAYS)}y`;
}
