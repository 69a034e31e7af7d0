function pad(n: number): string {
  return String(n).padStart(2, '0');
}

export function currentMonth(now = new Date()): string {
  return `${now.getFullYear()}-${pad(now.getMonth() + 1)}`;
}

export function todayIso(now = new Date()): string {
  return `${now.getFullYear()}-${pad(now.getMonth() + 1)}-${pad(now.getDate())}`;
}

export function advanceMonth(month: string, count = 1): string {
  const [y, m] = month.split('-').map(Number);
  const index = y * 12 + (m - 1) + count;
  return `${Math.floor(index / 12)}-${pad((index % 12) + 1)}`;
}

export function monthSequence(start: string, count: number): string[] {
  const months: string[] = [];
  for (let i = 0; i < count; i++) {
    months.push(advanceMonth(start, i));
  }
  return months;
}

function lastDayOfMonth(year: number, month: number): number {
  return new Date(Date.UTC(year, month, 0)).getUTCDate();
}

/**
 * Next payment date for a card due on `dueDay` of each month. A due day that
 * has already arrived rolls to next month; days past the month's end are
 * clamped (31 → Feb 28/29).
 */
export function nextDueDate(dueDay: number, today: string): string {
  const [y, m, d] = today.split('-').map(Number);
  let year = y;
  let month = m;

  if (d >= dueDay) {
    month += 1;
    if (month > 12) {
      month = 1;
      year += 1;
    }
  }

  const day = Math.min(Math.max(1, dueDay), lastDayOfMonth(year, month));
  return `${year}-${pad(month)}-${pad(day)}`;
}
