import { callCapability } from '../core/integrationPolicy';
import { CancelledError, errorMessage } from '../core/errors';
import { logWarn } from '../telemetry/logger';
import { ClassificationCapability, FIELD_SEMANTIC_TYPES, FieldSemanticType, VisibleField } from '../types/capabilities';

/** A visible field after run-time typing. Lives for one form run only. */
export interface FormField {
    identifier: string;
    label: string;
    semantic_type: FieldSemanticType;
    input_type: string | null;
    required: boolean;
    current_value: string;
    validation_error: string | null;
    options: string[];
}

const TEXT_INPUT_TYPES = new Set(['', 'text', 'email', 'tel', 'number', 'url', 'search', 'date', 'month', 'password']);

function normalized(value: string | null): string {
    return (value ?? '').trim().toLowerCase();
}

/**
 * Attribute heuristics. Returns null when the markup does not settle the type
 * (custom widgets, unknown roles).
 */
export function classifyFieldByAttributes(field: VisibleField): FieldSemanticType | null {
    const tag = normalized(field.tagName);
    const inputType = normalized(field.inputType);
    const role = normalized(field.role);

    if (tag === 'select') return 'select';
    if (tag === 'textarea') return 'text';
    if (tag === 'input') {
        if (inputType === 'file') return 'file';
        if (inputType === 'checkbox') return 'checkbox';
        if (inputType === 'radio') return 'radio';
        if (TEXT_INPUT_TYPES.has(inputType)) return 'text';
        return null;
    }
    if (role === 'radiogroup' || role === 'radio') return 'radio';
    if (role === 'checkbox' || role === 'switch') return 'checkbox';
    if ((role === 'combobox' || role === 'listbox') && field.options.length > 0) return 'select';
    if (role === 'textbox') return 'text';
    return null;
}

export function describeField(field: VisibleField): string {
    return [
        `label: ${field.label || '(none)'}`,
        `tag: ${field.tagName}`,
        `type: ${field.inputType ?? '(none)'}`,
        `role: ${field.role ?? '(none)'}`,
        `name: ${field.name ?? '(none)'}`,
        `placeholder: ${field.placeholder ?? '(none)'}`,
        `options: ${field.options.length > 0 ? field.options.join(' | ') : '(none)'}`,
    ].join('\n');
}

function coerceSemanticType(raw: string): FieldSemanticType {
    const lowered = raw.trim().toLowerCase();
    return FIELD_SEMANTIC_TYPES.find((type) => type === lowered) ?? 'unknown';
}

export interface FieldClassifierOptions {
    maxAttempts?: number;
    baseDelayMs?: number;
    signal?: AbortSignal;
}

export async function classifyField(
    field: VisibleField,
    capability: ClassificationCapability,
    options: FieldClassifierOptions = {}
): Promise<FormField> {
    let semanticType = classifyFieldByAttributes(field);
    if (!semanticType) {
        try {
            const answer = await callCapability(
                'classify',
                () => capability.classify(describeField(field), FIELD_SEMANTIC_TYPES),
                options
            );
            semanticType = coerceSemanticType(answer);
        } catch (error) {
            if (error instanceof CancelledError) throw error;
            await logWarn('form.field.classify_failed', { fieldId: field.identifier, error: errorMessage(error) });
            semanticType = 'unknown';
        }
    }
    return toFormField(field, semanticType);
}

export function toFormField(field: VisibleField, semanticType: FieldSemanticType): FormField {
    return {
        identifier: field.identifier,
        label: field.label,
        semantic_type: semanticType,
        input_type: field.inputType,
        required: field.required,
        current_value: field.currentValue,
        validation_error: field.validationError,
        options: field.options,
    };
}
