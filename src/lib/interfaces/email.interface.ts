export interface EmailTemplate {
	subject: string;
	body: string;
}
