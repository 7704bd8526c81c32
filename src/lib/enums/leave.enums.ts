export enum LeaveType {
	CASUAL = 'CASUAL',
	SICK = 'SICK',
	SPECIAL = 'SPECIAL',
	UNPAID = 'UNPAID',
}

export enum LeaveStatus {
	PENDING = 'PENDING',
	APPROVED = 'APPROVED',
	REJECTED = 'REJECTED',
	CANCELLED = 'CANCELLED',
}

export enum HolidayType {
	GAZETTED = 'GAZETTED',
	RESTRICTED = 'RESTRICTED',
}
