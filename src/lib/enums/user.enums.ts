export enum AccessLevel {
	EMPLOYEE = 'employee',
	ADMIN = 'admin',
	SUPER_ADMIN = 'super_admin',
}

export enum AccountStatus {
	ACTIVE = 'active',
	INACTIVE = 'inactive',
}

/**
 * Everything a role may be allowed to do. Routes declare the capability they need and
 * `hasCapability` in `access-level.util.ts` is the only place that maps roles onto them.
 */
export enum Capability {
	PUNCH_ATTENDANCE = 'attendance.punch',
	VIEW_OWN_ATTENDANCE = 'attendance.view.own',
	VIEW_CAMPUS_ATTENDANCE = 'attendance.view.campus',
	VIEW_GEOFENCE_VIOLATIONS = 'attendance.violations.view',
	ISSUE_RED_NOTICE = 'attendance.red-notice.issue',
	REVOKE_RED_NOTICE = 'attendance.red-notice.revoke',
	VIEW_CAMPUS_USERS = 'users.view.campus',
	MANAGE_USERS = 'users.manage',
	MANAGE_CAMPUSES = 'campus.manage',
	REQUEST_LEAVE = 'leave.request',
	DECIDE_LEAVE = 'leave.decide',
	MANAGE_HOLIDAYS = 'holidays.manage',
	REQUEST_INVENTORY = 'inventory.request',
	MANAGE_INVENTORY = 'inventory.manage',
	PUBLISH_ANNOUNCEMENT = 'announcements.publish',
}
