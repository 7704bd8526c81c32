import { AttendanceState, AttendanceStatus } from '../enums/attendance.enums';

export interface PunchInResponse {
	message: string;
	status: 'success';
}

export interface PunchOutResponse {
	message: string;
	total_hours: number;
	total_out_of_bounds_time: number;
	status: 'success';
}

export type LocationPingResponse = { status: 'Tracking active' } | { warning: string };

export interface AttendanceRecordView {
	employee_id: number;
	name: string | null;
	date: string;
	campus: string | null;
	punch_in: Date;
	punch_out: Date | null;
	total_hours: number | null;
	total_out_of_bounds_time: number;
	status: AttendanceStatus;
}

export interface TodayStatusResponse {
	message: string;
	state: AttendanceState;
	record: AttendanceRecordView | null;
}

export interface GeofenceViolation {
	employee_id: number;
	name: string;
	total_out_of_bounds_time: number;
}

export interface EscalationStatus {
	employee_id: number;
	name: string;
	violations: number;
	limit: number;
	eligible: boolean;
	red_notice_issued: boolean;
}

export interface RedNoticeResponse {
	message: string;
	violations: number;
}
