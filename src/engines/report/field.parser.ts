import type { ReportField } from '../../types/enums.js';
import { REPORT_FIELDS } from '../../types/enums.js';
import type { FieldRule, FieldRuleTable, ReportInfo } from '../../types/report.types.js';
import { FIELD_RULES } from './field-rules.js';

interface CompiledRule {
    rule: FieldRule;
    pattern: RegExp;
}

interface CompiledTable {
    fields: Array<[ReportField, CompiledRule[]]>;
    /** Every label of every field; values stop at these */
    labels: RegExp[];
}

const DATE_TOKEN = /\d{1,2}[/.-]\d{1,2}[/.-]\d{2,4}/;

const compiledTables = new WeakMap<FieldRuleTable, CompiledTable>();

/**
 * Regex for a label; the match spans the label and its delimiter
 */
export function compileLabel(rule: FieldRule): RegExp {
    const label = `(?:${rule.label})`;
    switch (rule.form) {
        case 'inline':
            return new RegExp(`(?<=^|\\s)${label}[^\\S\\n]*[:-][^\\S\\n]*`, 'gimu');
        case 'heading':
            return new RegExp(`(?<=^[^\\S\\n]*)${label}[^\\S\\n]*(?:[:-][^\\S\\n]*|$)`, 'gimu');
        case 'lead-in':
            return new RegExp(`(?<=^[^\\S\\n]*)${label}[^\\S\\n]+(?=\\S)`, 'gimu');
    }
}

function compileTable(table: FieldRuleTable): CompiledTable {
    const cached = compiledTables.get(table);
    if (cached) return cached;

    const fields = REPORT_FIELDS.map((field): [ReportField, CompiledRule[]] => [
        field,
        table[field].map(rule => ({ rule, pattern: compileLabel(rule) })),
    ]);
    const compiled: CompiledTable = {
        fields,
        labels: fields.flatMap(([, rules]) => rules.map(r => r.pattern)),
    };

    compiledTables.set(table, compiled);
    return compiled;
}

/**
 * Position of the first label at or after `from`, or text length
 */
function nextLabelIndex(text: string, from: number, labels: readonly RegExp[]): number {
    let next = text.length;
    for (const label of labels) {
        for (const match of text.matchAll(label)) {
            const index = match.index ?? 0;
            if (index >= from) {
                next = Math.min(next, index);
                break;
            }
        }
    }
    return next;
}

function lineEndIndex(text: string, from: number): number {
    const end = text.indexOf('\n', from);
    return end === -1 ? text.length : end;
}

/**
 * Rest of the line from `from`, cut at a later label on the same line
 */
function lineValue(text: string, from: number, labels: readonly RegExp[]): string {
    const end = Math.min(lineEndIndex(text, from), nextLabelIndex(text, from, labels));
    return text.slice(from, end);
}

/**
 * Next non-blank line after the one containing `from`, unless it opens with a label
 */
function nextLineValue(text: string, from: number, labels: readonly RegExp[]): string {
    let lineStart = lineEndIndex(text, from) + 1;

    while (lineStart < text.length) {
        const lineEnd = lineEndIndex(text, lineStart);
        const line = text.slice(lineStart, lineEnd);
        const indent = line.length - line.trimStart().length;

        if (line.trim() !== '') {
            const contentStart = lineStart + indent;
            if (nextLabelIndex(text, contentStart, labels) === contentStart) {
                return '';
            }
            return lineValue(text, contentStart, labels);
        }
        lineStart = lineEnd + 1;
    }
    return '';
}

function normalizeLine(value: string): string {
    return value
        .replace(/\[[^\]\n]*\]/g, '')
        .replace(/\s+/g, ' ')
        .trim();
}

function normalizeBlock(value: string): string {
    return value
        .split('\n')
        .map(line => line.replace(/\s+/g, ' ').trim())
        .filter(line => line !== '')
        .join('\n');
}

function normalize(value: string, rule: FieldRule): string {
    switch (rule.normalize) {
        case 'line':
            return normalizeLine(value);
        case 'date':
            return DATE_TOKEN.exec(value)?.[0] ?? '';
        case 'block':
            return normalizeBlock(value);
    }
}

function captureValue(text: string, from: number, rule: FieldRule, labels: readonly RegExp[]): string {
    switch (rule.value) {
        case 'line':
            return lineValue(text, from, labels);
        case 'line-or-next': {
            const sameLine = lineValue(text, from, labels);
            return sameLine.trim() !== '' ? sameLine : nextLineValue(text, from, labels);
        }
        case 'block':
            return text.slice(from, nextLabelIndex(text, from, labels));
    }
}

function extractField(text: string, rules: readonly CompiledRule[], labels: readonly RegExp[]): string | null {
    for (const { rule, pattern } of rules) {
        for (const match of text.matchAll(pattern)) {
            const value = normalize(captureValue(text, (match.index ?? 0) + match[0].length, rule, labels), rule);
            if (value !== '') return value;
        }
    }
    return null;
}

/**
 * Report info with every field unset
 */
export function emptyReportInfo(): ReportInfo {
    return {
        patient_name: null,
        species: null,
        breed: null,
        sex: null,
        age: null,
        owner_name: null,
        veterinarian: null,
        date: null,
        diagnosis: null,
        recommendations: null,
    };
}

/**
 * Extract report fields from OCR text
 *
 * Each field takes the first rule, in table order, that yields a non-empty
 * value. Fields without a match are null; the parser never throws on text.
 *
 * @example
 * parseReportFields('Paciente: Luna\nEspecie: Canino').species; // 'Canino'
 */
export function parseReportFields(text: string, table: FieldRuleTable = FIELD_RULES): ReportInfo {
    const normalizedText = text.replace(/\r\n?/g, '\n');
    const { fields, labels } = compileTable(table);
    const info = emptyReportInfo();

    for (const [field, rules] of fields) {
        info[field] = extractField(normalizedText, rules, labels);
    }

    return info;
}
