export enum AttendanceStatus {
	PRESENT = 'PRESENT',
	COMPLETED = 'COMPLETED',
}

export enum AttendanceState {
	NO_RECORD = 'NO_RECORD',
	PUNCHED_IN = 'PUNCHED_IN',
	PUNCHED_OUT = 'PUNCHED_OUT',
}

export enum AttendancePeriod {
	DAILY = 'daily',
	WEEKLY = 'weekly',
	MONTHLY = 'monthly',
}

export enum AttendanceErrorCode {
	ALREADY_PUNCHED_IN = 'ALREADY_PUNCHED_IN',
	ALREADY_PUNCHED_OUT = 'ALREADY_PUNCHED_OUT',
	NO_ACTIVE_SESSION = 'NO_ACTIVE_SESSION',
	OUTSIDE_GEOFENCE = 'OUTSIDE_GEOFENCE',
}
