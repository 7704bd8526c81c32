import { Request } from 'express';
import { AccessLevel } from '../enums/user.enums';

export interface AuthenticatedUser {
	uid: number;
	email: string;
	fullName: string;
	role: AccessLevel;
	campusUid: number | null;
}

export interface AuthenticatedRequest extends Request {
	user: AuthenticatedUser;
}
