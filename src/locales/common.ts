/**
 * Spanwise - Locale-Independent Rules
 *
 * E-mail addresses, URLs and phone numbers read the same in every language.
 */

import { groupAt, regex } from '../pattern.js';
import { type Rule, rule } from '../rule.js';

const PHONE_DIGITS = { min: 9, max: 15 } as const;

export function commonRules(): Rule[] {
    return [
        rule({
            name: 'email',
            dimension: 'email',
            pattern: [regex('([\\p{L}\\p{N}._%+-]+@[\\p{L}\\p{N}-]+(?:\\.[\\p{L}\\p{N}-]+)*\\.\\p{L}{2,})')],
            production: (route) => {
                const value = groupAt(route, 0);
                return value === undefined ? null : { value };
            },
        }),
        rule({
            name: 'url',
            dimension: 'url',
            pattern: [
                regex(
                    '((?:https?://)?((?:[\\p{L}\\p{N}-]+\\.)+\\p{L}{2,})(?::\\d{1,5})?(?:/(?:[^\\s]*[^\\s.,;:!?)])?)?)'
                ),
            ],
            production: (route) => {
                const value = groupAt(route, 0, 1);
                const host = groupAt(route, 0, 2);
                if (value === undefined || host === undefined) return null;
                return { value, domain: host.toLowerCase().replace(/^www\./, '') };
            },
        }),
        rule({
            name: 'phone number',
            dimension: 'phoneNumber',
            pattern: [regex('(?:\\+\\d{1,3}[\\s.-]?)?(?:\\(\\d{1,4}\\)[\\s.-]?)?\\d{2,4}(?:[\\s.-]?\\d{2,4}){1,4}')],
            production: (route) => {
                const text = groupAt(route, 0, 0);
                if (text === undefined) return null;
                const digits = text.replace(/\D/g, '');
                if (digits.length < PHONE_DIGITS.min || digits.length > PHONE_DIGITS.max) return null;
                return { value: text.startsWith('+') ? `+${digits}` : digits };
            },
        }),
    ];
}
