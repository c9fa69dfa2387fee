import { Result, ok, fail, helicalParameterError, invalidRequestError } from './errors';

export const HELICAL_FORMS = ['AForm', 'BForm', 'Hybrid', 'Twisted'] as const;

export type HelicalForm = (typeof HELICAL_FORMS)[number];

export type TwistMode = 1 | 2 | 3;

export interface HelicalConfig {
    readonly minEdgeLength: number;
    readonly useAForm: boolean;
    readonly twist: TwistMode;
}

export const MIN_HELICAL_TURNS: Readonly<Record<HelicalForm, number>> = Object.freeze({
    AForm: 4,
    BForm: 3,
    Hybrid: 4,
    Twisted: 4
});

// Base pairs per helical turn
const B_FORM_RISE = 10.5;
const A_FORM_RISE = 11;

export function isHelicalForm(value: string): value is HelicalForm {
    return (HELICAL_FORMS as readonly string[]).includes(value);
}

export function resolveHelicalConfig(form: string, turns: number): Result<HelicalConfig> {
    if (!isHelicalForm(form)) {
        const valid = HELICAL_FORMS.join(', ');
        return fail(invalidRequestError(
            `Invalid helical form '${form}'`,
            `Valid options are: ${valid}`,
            [
                `Use one of the valid helical forms: ${valid}`,
                "For DNA structures, use 'BForm'",
                "For RNA structures, use 'AForm'",
                "For advanced users: 'Hybrid' and 'Twisted' are A-form variants"
            ]
        ));
    }

    const minTurns = MIN_HELICAL_TURNS[form];
    if (turns < minTurns) {
        return fail(helicalParameterError(form, turns, minTurns));
    }

    switch (form) {
        case 'BForm':
            return ok<HelicalConfig>({ minEdgeLength: Math.floor(turns * B_FORM_RISE), useAForm: false, twist: 1 });
        case 'AForm':
            return ok<HelicalConfig>({ minEdgeLength: turns * A_FORM_RISE, useAForm: true, twist: 1 });
        case 'Hybrid':
            return ok<HelicalConfig>({ minEdgeLength: turns * A_FORM_RISE, useAForm: true, twist: 2 });
        case 'Twisted':
            return ok<HelicalConfig>({ minEdgeLength: turns * A_FORM_RISE, useAForm: true, twist: 3 });
    }
}
