import { AccessLevel } from '../enums/user.enums';

const SUPER_ADMIN_LOCAL_PART = /^(vc|vcoffice)$/;
const ADMIN_LOCAL_PART = /^(director-[a-z]+|hroffice)$/;
const EMPLOYEE_LOCAL_PART = /^[a-zA-Z0-9_.+-]+$/;

export const PASSWORD_POLICY = /^(?=.*[a-z])(?=.*[A-Z])(?=.*\d)(?=.*[@#$%^&+=]).{6,}$/;

/**
 * Derives the role of a new account from its institution address. Returns null for
 * addresses outside the institution domain.
 */
export function assignAccessLevel(email: string, institutionDomain: string): AccessLevel | null {
	const at = email.lastIndexOf('@');
	if (at <= 0) return null;

	const localPart = email.slice(0, at);
	const domain = email.slice(at + 1);

	if (domain.toLowerCase() !== institutionDomain.toLowerCase()) return null;
	if (SUPER_ADMIN_LOCAL_PART.test(localPart)) return AccessLevel.SUPER_ADMIN;
	if (ADMIN_LOCAL_PART.test(localPart)) return AccessLevel.ADMIN;
	if (EMPLOYEE_LOCAL_PART.test(localPart)) return AccessLevel.EMPLOYEE;

	return null;
}
