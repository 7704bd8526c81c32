import { AccessLevel } from '../enums/user.enums';

export interface Token {
	uid: number;
	email: string;
	role: AccessLevel;
	iat?: number;
	exp?: number;
}
