import { TimezoneUtil } from './timezone.util';

describe('TimezoneUtil', () => {
	describe('isValidTimezone', () => {
		it('should validate correct timezones', () => {
			expect(TimezoneUtil.isValidTimezone('Asia/Kolkata')).toBe(true);
			expect(TimezoneUtil.isValidTimezone('UTC')).toBe(true);
		});

		it('should reject invalid timezones', () => {
			expect(TimezoneUtil.isValidTimezone('Invalid/Timezone')).toBe(false);
			expect(TimezoneUtil.isValidTimezone('')).toBe(false);
			expect(TimezoneUtil.isValidTimezone(null)).toBe(false);
		});
	});

	describe('getSafeTimezone', () => {
		it('should return valid timezone when provided', () => {
			expect(TimezoneUtil.getSafeTimezone('Asia/Kolkata')).toBe('Asia/Kolkata');
		});

		it('should fall back to UTC for invalid timezones', () => {
			expect(TimezoneUtil.getSafeTimezone('Invalid/Timezone')).toBe('UTC');
			expect(TimezoneUtil.getSafeTimezone(undefined)).toBe('UTC');
		});
	});

	describe('toCalendarDate', () => {
		it('should use the calendar day of the target timezone', () => {
			const instant = new Date('2024-03-04T20:00:00Z');

			expect(TimezoneUtil.toCalendarDate(instant, 'UTC')).toBe('2024-03-04');
			// UTC+05:30
			expect(TimezoneUtil.toCalendarDate(instant, 'Asia/Kolkata')).toBe('2024-03-05');
		});

		it('should treat an unknown timezone as UTC', () => {
			expect(TimezoneUtil.toCalendarDate(new Date('2024-03-04T23:59:00Z'), 'Nowhere/Else')).toBe('2024-03-04');
		});
	});

	describe('formatTime', () => {
		it('should format hours and minutes in the timezone', () => {
			expect(TimezoneUtil.formatTime(new Date('2024-03-04T09:15:00Z'), 'Asia/Kolkata')).toBe('14:45');
		});
	});

	describe('dayBounds', () => {
		it('should cover the whole day of the timezone', () => {
			const { start, end } = TimezoneUtil.dayBounds('2024-03-05', 'Asia/Kolkata');

			expect(start.toISOString()).toBe('2024-03-04T18:30:00.000Z');
			expect(end.toISOString()).toBe('2024-03-05T18:29:59.999Z');
		});
	});
});
