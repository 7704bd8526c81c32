import { EmailType } from '../enums/email.enums';

export interface BaseEmailData {
	name: string;
}

export interface OtpEmailData extends BaseEmailData {
	otp: string;
	expiryMinutes: number;
}

export interface AccountVerifiedEmailData extends BaseEmailData {
	role: string;
}

export interface PasswordChangedData extends BaseEmailData {
	changeTime: string;
}

export interface RedNoticeIssuedEmailData extends BaseEmailData {
	reason: string;
	violations: number;
	issuedBy: string;
	issuedAt: string;
}

export interface LeaveStatusUpdateEmailData extends BaseEmailData {
	leaveType: string;
	startDate: string;
	endDate: string;
	duration: number;
	status: string;
	rejectionReason?: string | null;
}

export interface InventoryRequestUpdateEmailData extends BaseEmailData {
	itemName: string;
	quantity: number;
	status: string;
}

export interface EmailDataMap {
	[EmailType.SIGNUP_OTP]: OtpEmailData;
	[EmailType.ACCOUNT_VERIFIED]: AccountVerifiedEmailData;
	[EmailType.PASSWORD_RESET_OTP]: OtpEmailData;
	[EmailType.PASSWORD_CHANGED]: PasswordChangedData;
	[EmailType.RED_NOTICE_ISSUED]: RedNoticeIssuedEmailData;
	[EmailType.LEAVE_STATUS_UPDATE]: LeaveStatusUpdateEmailData;
	[EmailType.INVENTORY_REQUEST_UPDATE]: InventoryRequestUpdateEmailData;
}

export type EmailTemplateData<T extends EmailType> = EmailDataMap[T];
