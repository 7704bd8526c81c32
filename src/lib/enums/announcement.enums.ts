export enum AnnouncementLevel {
	UNIVERSITY = 'UNIVERSITY',
	CAMPUS = 'CAMPUS',
}
