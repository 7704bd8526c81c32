import Handlebars from 'handlebars';
import { format, isValid, parseISO } from 'date-fns';

Handlebars.registerHelper('formatDate', function (date: string | Date | null | undefined) {
	if (!date) return 'N/A';

	const dateObj = typeof date === 'string' ? parseISO(date) : date;
	return isValid(dateObj) ? format(dateObj, 'd MMMM yyyy') : String(date);
});

Handlebars.registerHelper('eq', function (left: unknown, right: unknown) {
	return left === right;
});

Handlebars.registerHelper('plural', function (count: number, singular: string, pluralForm: string) {
	return count === 1 ? singular : pluralForm;
});
