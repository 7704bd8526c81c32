export interface AnnouncementView {
	uid: number;
	title: string;
	description: string;
	created_by: string | null;
	created_at: Date;
}
