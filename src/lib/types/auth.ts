import { AccessLevel, AccountStatus } from '../enums/user.enums';

export interface ProfileData {
	uid: number;
	employeeId: string | null;
	email: string;
	fullName: string;
	accessLevel: AccessLevel;
	status: AccountStatus;
	campus: { uid: number; name: string } | null;
	designation: string | null;
	department: string | null;
	dateOfJoining: string | null;
	shift: string | null;
	profilePicture: string | null;
	redNoticeIssued: boolean;
}

export interface LeaveBalance {
	casual: number;
	sick: number;
	special: number;
}

export interface SignInResponse {
	message: string;
	access_token: string;
	token_type: 'bearer';
	role: AccessLevel;
}

export interface SignUpResponse {
	message: string;
	email: string;
}

export interface MessageResponse {
	message: string;
}
