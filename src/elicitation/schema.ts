/**
 * Elicitation field handling
 *
 * Reads the JSON schema a backend sends with an elicitation request into an
 * ordered field list, parses operator input per field, and builds the typed
 * response object.
 */

import AjvModule from 'ajv';
import _ from 'lodash';
import { dynamicLogger as logger } from '../utils/silent-logger.js';
import { ElicitationParseError, errorMessage } from '../utils/errors.js';
import type {
    ElicitationField,
    ElicitationFieldType,
    RequestedSchema
} from '../types/elicitation.js';

const Ajv = AjvModule.default;

const FIELD_TYPES: readonly ElicitationFieldType[] = ['string', 'integer', 'number', 'boolean', 'object', 'array'];
const TRUTHY_INPUTS = ['true', '1', 'yes', 'y'];
const INTEGER_PATTERN = /^[+-]?\d+$/;
const NUMBER_PATTERN = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;

export type ReservedAction = 'decline' | 'cancel';

function isRecord(value: unknown): value is Record<string, unknown> {
    return _.isPlainObject(value);
}

function fieldType(declared: unknown): ElicitationFieldType {
    const candidate = _.isArray(declared) ? _.find(declared, _.isString) : declared;
    return _.find(FIELD_TYPES, type => type === candidate) ?? 'string';
}

/**
 * Display form of a value in prompts and messages
 */
export function displayValue(value: unknown): string {
    return _.isString(value) ? value : JSON.stringify(value);
}

/**
 * `decline` or `cancel` (any case) end the handshake wherever they are typed
 */
export function reservedAction(input: string): ReservedAction | undefined {
    const token = input.trim().toLowerCase();
    return token === 'decline' || token === 'cancel' ? token : undefined;
}

/**
 * Ordered fields of a requested schema. No schema, or one without
 * properties, yields no fields.
 */
export function parseRequestedSchema(schema?: RequestedSchema): ElicitationField[] {
    if(!schema || !isRecord(schema.properties)) {
        return [];
    }
    const required = schema.required ?? [];

    return _.map(_.toPairs(schema.properties), ([name, rawProperty]): ElicitationField => {
        const property = isRecord(rawProperty) ? rawProperty : {};
        const description = _.isString(property.description)
            ? property.description
            : _.isString(property.title) ? property.title : '';

        return {
            name,
            type:     fieldType(property.type),
            required: _.includes(required, name),
            description,
            ...('default' in property ? { default: property.default } : {}),
            ...(_.isArray(property.enum) ? { enumValues: property.enum } : {}),
            ...('const' in property ? { const: property.const } : {}),
        };
    });
}

function parseTyped(field: ElicitationField, input: string): unknown {
    switch(field.type) {
        case 'integer': {
            if(!INTEGER_PATTERN.test(input)) {
                throw new ElicitationParseError(field.name, `Invalid value for ${field.name}: expected an integer`);
            }
            const value = Number(input);
            if(!Number.isSafeInteger(value)) {
                throw new ElicitationParseError(field.name, `Invalid value for ${field.name}: integer out of range`);
            }
            return value;
        }
        case 'number': {
            const value = Number(input);
            if(!NUMBER_PATTERN.test(input) || !Number.isFinite(value)) {
                throw new ElicitationParseError(field.name, `Invalid value for ${field.name}: expected a number`);
            }
            return value;
        }
        case 'boolean':
            return _.includes(TRUTHY_INPUTS, input.toLowerCase());
        case 'object':
        case 'array': {
            let value: unknown;
            try {
                value = JSON.parse(input);
            } catch (error) {
                throw new ElicitationParseError(field.name, `Invalid value for ${field.name}: ${errorMessage(error)}`);
            }
            const matches = field.type === 'object' ? isRecord(value) : _.isArray(value);
            if(!matches) {
                throw new ElicitationParseError(field.name, `Invalid value for ${field.name}: expected a JSON ${field.type}`);
            }
            return value;
        }
        case 'string':
            return input;
    }
}

/**
 * Parse one non-empty operator input for a field and check it against the
 * field's enum and const
 *
 * @throws ElicitationParseError when the input does not fit
 */
export function parseFieldValue(field: ElicitationField, rawInput: string): unknown {
    const value = parseTyped(field, rawInput.trim());

    if(field.enumValues && !_.some(field.enumValues, option => _.isEqual(option, value))) {
        throw new ElicitationParseError(field.name, `Invalid value. Must be one of: ${_.map(field.enumValues, displayValue).join(', ')}`);
    }
    if('const' in field && !_.isEqual(field.const, value)) {
        throw new ElicitationParseError(field.name, `Value must be: ${displayValue(field.const)}`);
    }
    return value;
}

/**
 * Operator-facing prompt for one field
 */
export function fieldPrompt(field: ElicitationField): string {
    const lines = [`Enter ${field.name} (${field.type}) ${field.required ? '[REQUIRED]' : '[optional]'}`];
    if(field.description) {
        lines.push(`   ${field.description}`);
    }
    if(field.default !== undefined && field.default !== null) {
        lines.push(`   Default: ${displayValue(field.default)}`);
    }
    if(field.enumValues && field.enumValues.length > 0) {
        lines.push(`   Options: ${_.map(field.enumValues, displayValue).join(', ')}`);
    }
    return lines.join('\n');
}

/**
 * Validate the collected values against the requested schema, filling
 * defaults. If the schema cannot be compiled or the values do not validate,
 * the raw collected map is returned unchanged.
 */
export function buildTypedContent(schema: RequestedSchema | undefined, collected: Readonly<Record<string, unknown>>): Record<string, unknown> {
    if(!schema) {
        return { ...collected };
    }
    try {
        const ajv = new Ajv({ allErrors: true, useDefaults: true, coerceTypes: true, strict: false });
        const validate = ajv.compile({ ...schema, type: 'object' });
        const content = _.cloneDeep({ ...collected });
        if(validate(content)) {
            return content;
        }
        const errors = _.map(validate.errors ?? [], e => `${e.instancePath} ${e.message ?? ''}`.trim()).join(', ');
        logger.warn({ errors }, 'Elicitation response does not match requested schema, returning collected values');
    } catch (error) {
        logger.warn({ error: errorMessage(error) }, 'Failed to build typed elicitation response, returning collected values');
    }
    return { ...collected };
}
