import { ConfigService } from '@nestjs/config';
import { TimezoneUtil } from '../../lib/utils/timezone.util';

export interface AttendanceSettings {
	timezone: string;
	violationThresholdMinutes: number;
	redNoticeViolationLimit: number;
}

const numberOr = (value: string | undefined, fallback: number): number => {
	const parsed = value === undefined ? Number.NaN : Number(value);
	return Number.isFinite(parsed) && parsed >= 0 ? parsed : fallback;
};

export function readAttendanceSettings(configService: ConfigService): AttendanceSettings {
	return {
		timezone: TimezoneUtil.getSafeTimezone(configService.get<string>('ATTENDANCE_TIMEZONE')),
		violationThresholdMinutes: numberOr(configService.get<string>('GEOFENCE_VIOLATION_THRESHOLD_MINUTES'), 30),
		redNoticeViolationLimit: Math.floor(numberOr(configService.get<string>('RED_NOTICE_VIOLATION_LIMIT'), 5)),
	};
}
