import type { ReportField } from './enums.js';

/**
 * Structured report fields; every field is independently nullable
 */
export type ReportInfo = Record<ReportField, string | null>;

/**
 * Where a label may appear and how it is delimited
 * - inline: line start or after whitespace, followed by ':' or '-'
 * - heading: line start, followed by a delimiter or end of line
 * - lead-in: line start, running straight into the value
 */
export type LabelForm = 'inline' | 'heading' | 'lead-in';

/**
 * Which text after the label forms the value
 * - line: rest of the line
 * - line-or-next: rest of the line, else the next non-blank line
 * - block: up to the next recognized label or end of text
 */
export type ValueLayout = 'line' | 'line-or-next' | 'block';

export type CaptureNormalization = 'line' | 'date' | 'block';

/**
 * One label-pattern alternative of a field
 */
export interface FieldRule {
    /** Regular expression source of the label itself */
    label: string;
    form: LabelForm;
    value: ValueLayout;
    normalize: CaptureNormalization;
}

/**
 * Ordered alternatives per field; the first rule yielding a value wins
 */
export type FieldRuleTable = Readonly<Record<ReportField, readonly FieldRule[]>>;
