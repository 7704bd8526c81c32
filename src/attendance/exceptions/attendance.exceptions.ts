import { BadRequestException } from '@nestjs/common';
import { AttendanceErrorCode } from '../../lib/enums/attendance.enums';

/**
 * Attendance state conflicts and geofence rejections. All are 400s; the `error` field
 * carries the machine-readable code.
 */
abstract class AttendanceException extends BadRequestException {
	protected constructor(
		readonly code: AttendanceErrorCode,
		message: string,
	) {
		super({ statusCode: 400, message, error: code });
	}
}

export class AlreadyPunchedInException extends AttendanceException {
	constructor() {
		super(AttendanceErrorCode.ALREADY_PUNCHED_IN, 'Already punched in today');
	}
}

export class AlreadyPunchedOutException extends AttendanceException {
	constructor() {
		super(AttendanceErrorCode.ALREADY_PUNCHED_OUT, 'Already punched out today');
	}
}

export class NoActiveSessionException extends AttendanceException {
	constructor(message = 'No active punch-in session found') {
		super(AttendanceErrorCode.NO_ACTIVE_SESSION, message);
	}
}

export class OutsideGeofenceException extends AttendanceException {
	constructor(action: 'Punch-in' | 'Punch-out') {
		super(AttendanceErrorCode.OUTSIDE_GEOFENCE, `${action} location outside campus geofence`);
	}
}
