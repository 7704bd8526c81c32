import { HolidayType, LeaveStatus, LeaveType } from '../enums/leave.enums';

export type CalendarColor = 'blue' | 'purple' | 'green' | 'yellow' | 'red';

export interface HolidayCalendarEntry {
	date: string;
	name: string;
	type: HolidayType;
	color: CalendarColor;
}

export interface LeaveCalendarEntry {
	date: string;
	end_date: string;
	name: string;
	status: LeaveStatus;
	color: CalendarColor;
}

export type CalendarEntry = HolidayCalendarEntry | LeaveCalendarEntry;

export interface LeaveView {
	uid: number;
	employee_id: number;
	name: string | null;
	leave_type: LeaveType;
	start_date: string;
	end_date: string;
	duration: number;
	reason: string;
	status: LeaveStatus;
	rejection_reason: string | null;
}
