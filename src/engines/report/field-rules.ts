import type { FieldRule, FieldRuleTable } from '../../types/report.types.js';

/** Horizontal whitespace inside a label */
const _ = '[^\\S\\n]+';

const inline = (label: string, value: FieldRule['value'] = 'line-or-next'): FieldRule =>
    ({ label, form: 'inline', value, normalize: 'line' });
const section = (label: string): FieldRule => ({ label, form: 'heading', value: 'block', normalize: 'block' });

/**
 * Label patterns per report field, Spanish first, then English
 *
 * Labels are case-insensitive regular expression sources. Single-line
 * values may sit on the line after their label, except for age. Block fields
 * (diagnosis, recommendations) end at the next label of any field.
 */
export const FIELD_RULES: FieldRuleTable = {
    patient_name: [
        inline(`Nombre${_}del${_}paciente`),
        inline('Paciente'),
        inline(`Nombre(?!${_}del)`),
        inline(`Patient(?:${_}name)?`),
    ],
    species: [
        inline('Especie'),
        inline('Species'),
    ],
    breed: [
        inline('Raza'),
        inline('Breed'),
    ],
    sex: [
        inline('Sexo'),
        inline('Sex'),
    ],
    age: [
        // age never wraps onto the next line
        inline('Edad', 'line'),
        inline('Age', 'line'),
    ],
    owner_name: [
        inline(`Nombre${_}del${_}(?:propietari[oa]|tutor)`),
        inline('Tutor'),
        inline('Propietari[oa]'),
        inline('Due[ñn][oa]'),
        inline('Owner'),
    ],
    veterinarian: [
        inline('Derivante'),
        inline('Profesional'),
        inline(`Referido${_}por`),
        inline(`M[eé]dico${_}(?:veterinari[oa]|derivante|tratante|remitente)`),
        inline(`Veterinari[oa](?:${_}(?:derivante|tratante|remitente))?`),
        inline(`Referring${_}vet(?:erinarian)?`),
        inline('Veterinarian'),
    ],
    date: [
        { label: `Fecha(?:${_}del?${_}(?:estudio|informe|examen))?`, form: 'heading', value: 'line-or-next', normalize: 'date' },
        { label: 'Fecha', form: 'inline', value: 'line', normalize: 'date' },
        { label: `Date(?:${_}of${_}(?:study|report|exam))?`, form: 'heading', value: 'line-or-next', normalize: 'date' },
        { label: 'Date', form: 'inline', value: 'line', normalize: 'date' },
    ],
    diagnosis: [
        section(`Diagn[oó]stico(?:${_}(?:radiogr[aá]fico|ecogr[aá]fico|ecocardiogr[aá]fico|presuntivo|definitivo))?`),
        section('Conclusi[oó]n(?:es)?'),
        section('Hallazgos'),
        section(`Impresi[oó]n${_}diagn[oó]stica`),
        section('Diagnosis'),
        section('Conclusions?'),
        section('Findings'),
    ],
    recommendations: [
        section('Recomendaci[oó]n(?:es)?'),
        { label: `Se${_}recomienda`, form: 'lead-in', value: 'block', normalize: 'block' },
        section('Comentarios?'),
        section('Observaciones'),
        section('Notas?'),
        section('Recommendations?'),
        section('Comments?'),
        section('Notes?'),
    ],
};
