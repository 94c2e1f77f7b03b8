/**
 * Elicitation handshake types
 */

export type ElicitationFieldType = 'string' | 'integer' | 'number' | 'boolean' | 'object' | 'array';

export interface ElicitationField {
    readonly name:        string
    readonly type:        ElicitationFieldType
    readonly required:    boolean
    readonly description: string
    readonly default?:    unknown
    readonly enumValues?: readonly unknown[]
    readonly const?:      unknown
}

/** JSON schema of the value a backend asks for (an object schema) */
export interface RequestedSchema {
    readonly type?:       string
    readonly properties?: Readonly<Record<string, unknown>>
    readonly required?:   readonly string[]
}

export interface ElicitationRequest {
    readonly message:          string
    readonly requestedSchema?: RequestedSchema
}

export type ElicitationAction = 'accept' | 'decline' | 'cancel';

/**
 * How a handshake ended. `decline` lets the backend continue without the
 * input, `cancel` asks it to stop entirely. `partial` carries whatever was
 * collected before the operator aborted; `skippedFields` names optional
 * fields left empty.
 */
export type ElicitationOutcome
    = | {
        readonly action:         'accept'
        readonly content:        Readonly<Record<string, unknown>>
        readonly skippedFields?: readonly string[]
    }
    | {
        readonly action:         'decline' | 'cancel'
        readonly partial?:       Readonly<Record<string, unknown>>
        readonly skippedFields?: readonly string[]
    };

/**
 * The elicitation callback handed to a transport executor
 */
export type ElicitationHandler = (request: ElicitationRequest) => Promise<ElicitationOutcome>;

export interface ElicitationRecord {
    readonly message:         string
    readonly fields:          readonly ElicitationField[]
    readonly collectedValues: Readonly<Record<string, unknown>>
    readonly skippedFields:   readonly string[]
    readonly action:          ElicitationAction
    readonly timestamp:       string
}
