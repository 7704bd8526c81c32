import { differenceInCalendarDays, format, isValid, parse, startOfWeek } from 'date-fns';
import { AttendancePeriod } from '../enums/attendance.enums';

export interface CalendarRange {
	start: string;
	end: string;
}

const CALENDAR_DATE_FORMAT = 'yyyy-MM-dd';
const CALENDAR_DATE_PATTERN = /^\d{4}-\d{2}-\d{2}$/;

/**
 * Calendar-date arithmetic on `yyyy-MM-dd` strings. Working on plain dates keeps
 * week and month boundaries independent of the server timezone.
 */
export class DateRangeUtil {
	static isCalendarDate(value: string): boolean {
		if (!CALENDAR_DATE_PATTERN.test(value)) {
			return false;
		}

		const parsed = parse(value, CALENDAR_DATE_FORMAT, new Date());
		return isValid(parsed) && format(parsed, CALENDAR_DATE_FORMAT) === value;
	}

	static parseCalendarDate(value: string): Date {
		return parse(value, CALENDAR_DATE_FORMAT, new Date());
	}

	/**
	 * Monday of the week containing `date`
	 */
	static startOfWeek(date: string): string {
		return format(startOfWeek(this.parseCalendarDate(date), { weekStartsOn: 1 }), CALENDAR_DATE_FORMAT);
	}

	static startOfMonth(date: string): string {
		return `${date.slice(0, 8)}01`;
	}

	/**
	 * Period-to-date range ending on `today`
	 */
	static periodToDate(period: AttendancePeriod, today: string): CalendarRange {
		switch (period) {
			case AttendancePeriod.DAILY:
				return { start: today, end: today };
			case AttendancePeriod.WEEKLY:
				return { start: this.startOfWeek(today), end: today };
			case AttendancePeriod.MONTHLY:
				return { start: this.startOfMonth(today), end: today };
		}
	}

	/**
	 * Number of calendar days from `start` to `end`, both included
	 */
	static inclusiveDays(start: string, end: string): number {
		return differenceInCalendarDays(this.parseCalendarDate(end), this.parseCalendarDate(start)) + 1;
	}

	static overlaps(a: CalendarRange, b: CalendarRange): boolean {
		return a.start <= b.end && b.start <= a.end;
	}
}
