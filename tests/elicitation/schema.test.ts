import { describe, it, expect } from 'vitest';
import {
    buildTypedContent,
    displayValue,
    fieldPrompt,
    parseFieldValue,
    parseRequestedSchema,
    reservedAction
} from '../../src/elicitation/schema.js';
import { ElicitationParseError } from '../../src/utils/errors.js';
import type { ElicitationField, ElicitationFieldType } from '../../src/types/elicitation.js';

function field(name: string, type: ElicitationFieldType, extra: Partial<ElicitationField> = {}): ElicitationField {
    return { name, type, required: false, description: '', ...extra };
}

describe('parseRequestedSchema', () => {
    it('yields no fields without a schema or properties', () => {
        expect(parseRequestedSchema()).toEqual([]);
        expect(parseRequestedSchema({ type: 'object' })).toEqual([]);
    });

    it('reads fields in declaration order', () => {
        const fields = parseRequestedSchema({
            type:       'object',
            properties: {
                name:  { type: 'string', title: 'Full name' },
                age:   { type: 'integer', description: 'Age in years', default: 30 },
                color: { type: 'string', enum: ['red', 'green'] },
                ratio: { type: ['number', 'null'] },
                when:  { type: 'date' },
                agree: { type: 'boolean', const: true },
            },
            required: ['name', 'agree'],
        });

        expect(fields).toEqual([
            { name: 'name', type: 'string', required: true, description: 'Full name' },
            { name: 'age', type: 'integer', required: false, description: 'Age in years', default: 30 },
            { name: 'color', type: 'string', required: false, description: '', enumValues: ['red', 'green'] },
            { name: 'ratio', type: 'number', required: false, description: '' },
            { name: 'when', type: 'string', required: false, description: '' },
            { name: 'agree', type: 'boolean', required: true, description: '', const: true },
        ]);
    });
});

describe('parseFieldValue', () => {
    it('parses integers', () => {
        expect(parseFieldValue(field('age', 'integer'), '42')).toBe(42);
        expect(parseFieldValue(field('age', 'integer'), '-7')).toBe(-7);
        expect(() => parseFieldValue(field('age', 'integer'), '4.2')).toThrow('Invalid value for age: expected an integer');
        expect(() => parseFieldValue(field('age', 'integer'), '99999999999999999999')).toThrow('Invalid value for age: integer out of range');
    });

    it('parses numbers', () => {
        expect(parseFieldValue(field('ratio', 'number'), ' 3.5 ')).toBe(3.5);
        expect(parseFieldValue(field('ratio', 'number'), '1e3')).toBe(1000);
        expect(() => parseFieldValue(field('ratio', 'number'), 'abc')).toThrow('Invalid value for ratio: expected a number');
    });

    it('reads booleans leniently', () => {
        expect(parseFieldValue(field('ok', 'boolean'), 'Yes')).toBe(true);
        expect(parseFieldValue(field('ok', 'boolean'), '1')).toBe(true);
        expect(parseFieldValue(field('ok', 'boolean'), 'no')).toBe(false);
        expect(parseFieldValue(field('ok', 'boolean'), 'maybe')).toBe(false);
    });

    it('parses JSON objects and arrays', () => {
        expect(parseFieldValue(field('opts', 'object'), '{"a":1}')).toEqual({ a: 1 });
        expect(parseFieldValue(field('tags', 'array'), '["x","y"]')).toEqual(['x', 'y']);
        expect(() => parseFieldValue(field('opts', 'object'), '[1]')).toThrow('Invalid value for opts: expected a JSON object');
        expect(() => parseFieldValue(field('tags', 'array'), '{bad')).toThrow(ElicitationParseError);
    });

    it('keeps strings as typed', () => {
        expect(parseFieldValue(field('name', 'string'), '  Ada Lovelace ')).toBe('Ada Lovelace');
    });

    it('checks enum and const', () => {
        const color = field('color', 'string', { enumValues: ['red', 'green'] });
        expect(parseFieldValue(color, 'green')).toBe('green');
        expect(() => parseFieldValue(color, 'blue')).toThrow('Invalid value. Must be one of: red, green');

        const agree = field('agree', 'boolean', { const: true });
        expect(() => parseFieldValue(agree, 'no')).toThrow('Value must be: true');
    });
});

describe('reservedAction', () => {
    it('recognizes decline and cancel in any case', () => {
        expect(reservedAction(' Cancel ')).toBe('cancel');
        expect(reservedAction('DECLINE')).toBe('decline');
        expect(reservedAction('cancelled')).toBeUndefined();
    });
});

describe('fieldPrompt', () => {
    it('shows type, requirement, description, default and options', () => {
        const color = field('color', 'string', { required: true, description: 'Pick one', default: 'red', enumValues: ['red', 'green'] });

        expect(fieldPrompt(color)).toBe('Enter color (string) [REQUIRED]\n   Pick one\n   Default: red\n   Options: red, green');
    });

    it('is a single line for a bare optional field', () => {
        expect(fieldPrompt(field('note', 'string'))).toBe('Enter note (string) [optional]');
    });
});

describe('displayValue', () => {
    it('shows strings as-is and everything else as JSON', () => {
        expect(displayValue('text')).toBe('text');
        expect(displayValue(3)).toBe('3');
        expect(displayValue({ a: [1] })).toBe('{"a":[1]}');
    });
});

describe('buildTypedContent', () => {
    const schema = {
        type:       'object',
        properties: {
            count: { type: 'integer' },
            label: { type: 'string', default: 'none' },
        },
    };

    it('copies the values when there is no schema', () => {
        expect(buildTypedContent(undefined, { a: 1 })).toEqual({ a: 1 });
    });

    it('fills defaults and coerces types', () => {
        expect(buildTypedContent(schema, { count: '5' })).toEqual({ count: 5, label: 'none' });
    });

    it('returns the collected values when they do not validate', () => {
        expect(buildTypedContent(schema, { count: 'many' })).toEqual({ count: 'many' });
    });
});
