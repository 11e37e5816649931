// src/validation/patientInput.ts

import { z } from 'zod';
import { MAX_SEVERITY, MIN_SEVERITY, PatientInput } from '../models/Patient';
import { ValidationError } from '../errors';

// A JSON number, or text holding only an optionally signed run of digits
const numberOrNumericText = (message: string) =>
    z.union([z.number(), z.string().trim().regex(/^-?\d+$/, message).transform(Number)], { error: message });

export const patientInputSchema = z.object({
    id: numberOrNumericText('Patient ID must be a number').pipe(
        z.number().int('Patient ID must be a whole number')
    ),
    name: z.string().trim().min(1, 'Patient name cannot be empty'),
    severity: numberOrNumericText('Severity must be a number').pipe(
        z
            .number()
            .int('Severity must be a whole number')
            .min(MIN_SEVERITY, `Severity must be at least ${MIN_SEVERITY}`)
            .max(MAX_SEVERITY, `Severity must be at most ${MAX_SEVERITY}`)
    )
});

/**
 * Validate raw desk input (request body, scripted step)
 *
 * Numeric fields may arrive as numeric text.
 *
 * @throws ValidationError listing each failing field
 */
export function parsePatientInput(raw: unknown): PatientInput {
    const result = patientInputSchema.safeParse(raw);
    if (!result.success) {
        throw new ValidationError(
            'Invalid patient input',
            result.error.issues.map(issue => ({
                field: issue.path.map(String).join('.') || '(root)',
                message: issue.message
            }))
        );
    }
    return result.data;
}
