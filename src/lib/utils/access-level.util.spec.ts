import { ForbiddenException } from '@nestjs/common';
import { AccessLevel, Capability } from '../enums/user.enums';
import { AuthenticatedUser } from '../interfaces/authenticated-request.interface';
import { canAccessCampus, hasCapability, isAccessLevel, resolveCampusScope } from './access-level.util';

const user = (role: AccessLevel, campusUid: number | null): AuthenticatedUser => ({
	uid: 1,
	email: 'someone@university.edu',
	fullName: 'Some One',
	role,
	campusUid,
});

describe('access-level util', () => {
	describe('hasCapability', () => {
		it('should keep reporting capabilities away from employees', () => {
			expect(hasCapability(AccessLevel.EMPLOYEE, Capability.PUNCH_ATTENDANCE)).toBe(true);
			expect(hasCapability(AccessLevel.EMPLOYEE, Capability.VIEW_GEOFENCE_VIOLATIONS)).toBe(false);
			expect(hasCapability(AccessLevel.EMPLOYEE, Capability.ISSUE_RED_NOTICE)).toBe(false);
		});

		it('should grant campus capabilities to admins but not registry management', () => {
			expect(hasCapability(AccessLevel.ADMIN, Capability.VIEW_GEOFENCE_VIOLATIONS)).toBe(true);
			expect(hasCapability(AccessLevel.ADMIN, Capability.ISSUE_RED_NOTICE)).toBe(true);
			expect(hasCapability(AccessLevel.ADMIN, Capability.MANAGE_CAMPUSES)).toBe(false);
			expect(hasCapability(AccessLevel.ADMIN, Capability.REVOKE_RED_NOTICE)).toBe(false);
		});

		it('should grant every capability to super admins', () => {
			for (const capability of Object.values(Capability)) {
				expect(hasCapability(AccessLevel.SUPER_ADMIN, capability)).toBe(true);
			}
		});

		it('should deny a missing role', () => {
			expect(hasCapability(undefined, Capability.PUNCH_ATTENDANCE)).toBe(false);
		});
	});

	describe('isAccessLevel', () => {
		it('should accept only known roles', () => {
			expect(isAccessLevel('admin')).toBe(true);
			expect(isAccessLevel('inventory_admin')).toBe(false);
			expect(isAccessLevel(3)).toBe(false);
		});
	});

	describe('resolveCampusScope', () => {
		it('should let super admins pick any campus or none', () => {
			expect(resolveCampusScope(user(AccessLevel.SUPER_ADMIN, null), 7)).toBe(7);
			expect(resolveCampusScope(user(AccessLevel.SUPER_ADMIN, null))).toBeUndefined();
		});

		it('should pin admins to their own campus', () => {
			expect(resolveCampusScope(user(AccessLevel.ADMIN, 3))).toBe(3);
			expect(resolveCampusScope(user(AccessLevel.ADMIN, 3), 3)).toBe(3);
		});

		it('should reject an admin asking for another campus', () => {
			expect(() => resolveCampusScope(user(AccessLevel.ADMIN, 3), 4)).toThrow(ForbiddenException);
		});

		it('should reject admins without a campus and employees', () => {
			expect(() => resolveCampusScope(user(AccessLevel.ADMIN, null))).toThrow(ForbiddenException);
			expect(() => resolveCampusScope(user(AccessLevel.EMPLOYEE, 3))).toThrow(ForbiddenException);
		});
	});

	describe('canAccessCampus', () => {
		it('should match admins to their campus only', () => {
			expect(canAccessCampus(user(AccessLevel.ADMIN, 3), 3)).toBe(true);
			expect(canAccessCampus(user(AccessLevel.ADMIN, 3), 4)).toBe(false);
			expect(canAccessCampus(user(AccessLevel.SUPER_ADMIN, null), 4)).toBe(true);
			expect(canAccessCampus(user(AccessLevel.EMPLOYEE, 4), 4)).toBe(false);
		});
	});
});
