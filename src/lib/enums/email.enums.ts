export enum EmailType {
	SIGNUP_OTP = 'signup_otp',
	ACCOUNT_VERIFIED = 'account_verified',
	PASSWORD_RESET_OTP = 'password_reset_otp',
	PASSWORD_CHANGED = 'password_changed',
	RED_NOTICE_ISSUED = 'red_notice_issued',
	LEAVE_STATUS_UPDATE = 'leave_status_update',
	INVENTORY_REQUEST_UPDATE = 'inventory_request_update',
}
