import { formatInTimeZone, fromZonedTime } from 'date-fns-tz';

/**
 * Timezone helpers for deciding which calendar day an attendance event belongs to
 */
export class TimezoneUtil {
	static readonly DEFAULT_TIMEZONE = 'UTC';

	static isValidTimezone(timezone?: string | null): boolean {
		if (!timezone) {
			return false;
		}

		try {
			new Intl.DateTimeFormat('en-US', { timeZone: timezone });
			return true;
		} catch {
			return false;
		}
	}

	static getSafeTimezone(timezone?: string | null): string {
		return timezone && this.isValidTimezone(timezone) ? timezone : this.DEFAULT_TIMEZONE;
	}

	/**
	 * Calendar date (`yyyy-MM-dd`) of an instant as seen in the given timezone
	 */
	static toCalendarDate(date: Date, timezone: string): string {
		return formatInTimeZone(date, this.getSafeTimezone(timezone), 'yyyy-MM-dd');
	}

	static formatTime(date: Date, timezone: string): string {
		return formatInTimeZone(date, this.getSafeTimezone(timezone), 'HH:mm');
	}

	/**
	 * First and last millisecond of a `yyyy-MM-dd` day in the given timezone
	 */
	static dayBounds(date: string, timezone: string): { start: Date; end: Date } {
		const safeTimezone = this.getSafeTimezone(timezone);
		return {
			start: fromZonedTime(`${date}T00:00:00.000`, safeTimezone),
			end: fromZonedTime(`${date}T23:59:59.999`, safeTimezone),
		};
	}
}
