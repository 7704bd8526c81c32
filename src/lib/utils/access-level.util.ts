import { ForbiddenException } from '@nestjs/common';
import { AccessLevel, Capability } from '../enums/user.enums';
import { AuthenticatedUser } from '../interfaces/authenticated-request.interface';

const EMPLOYEE_CAPABILITIES: Capability[] = [
	Capability.PUNCH_ATTENDANCE,
	Capability.VIEW_OWN_ATTENDANCE,
	Capability.REQUEST_LEAVE,
	Capability.REQUEST_INVENTORY,
];

const ADMIN_CAPABILITIES: Capability[] = [
	...EMPLOYEE_CAPABILITIES,
	Capability.VIEW_CAMPUS_ATTENDANCE,
	Capability.VIEW_GEOFENCE_VIOLATIONS,
	Capability.ISSUE_RED_NOTICE,
	Capability.VIEW_CAMPUS_USERS,
	Capability.DECIDE_LEAVE,
	Capability.MANAGE_INVENTORY,
	Capability.PUBLISH_ANNOUNCEMENT,
];

const CAPABILITIES: Record<AccessLevel, ReadonlySet<Capability>> = {
	[AccessLevel.EMPLOYEE]: new Set(EMPLOYEE_CAPABILITIES),
	[AccessLevel.ADMIN]: new Set(ADMIN_CAPABILITIES),
	[AccessLevel.SUPER_ADMIN]: new Set(Object.values(Capability)),
};

export function isAccessLevel(value: unknown): value is AccessLevel {
	return typeof value === 'string' && Object.values<string>(AccessLevel).includes(value);
}

export function hasCapability(role: AccessLevel | undefined, capability: Capability): boolean {
	if (!role) return false;
	return CAPABILITIES[role].has(capability);
}

/**
 * Super admins see every campus (or the one they ask for). Admins are pinned to their own
 * campus and may not ask for another one.
 */
export function resolveCampusScope(user: AuthenticatedUser, requestedCampusUid?: number): number | undefined {
	if (user.role === AccessLevel.SUPER_ADMIN) {
		return requestedCampusUid;
	}

	if (user.role !== AccessLevel.ADMIN || user.campusUid === null) {
		throw new ForbiddenException('Campus-scoped data requires an admin assigned to a campus');
	}

	if (requestedCampusUid !== undefined && requestedCampusUid !== user.campusUid) {
		throw new ForbiddenException('You can only access data for your own campus');
	}

	return user.campusUid;
}

export function canAccessCampus(user: AuthenticatedUser, campusUid: number | null | undefined): boolean {
	if (user.role === AccessLevel.SUPER_ADMIN) return true;
	return user.role === AccessLevel.ADMIN && user.campusUid !== null && user.campusUid === campusUid;
}
