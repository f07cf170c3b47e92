/**
 * Thrown when a value that must come from an argument or an environment variable is missing.
 */
export class ConfigurationError extends Error {
    public readonly variable: string;

    constructor(variable: string, message?: string) {
        super(message ?? `Missing value for the environment variable "${variable}"`);
        this.name = 'ConfigurationError';
        this.variable = variable;
    }
}

export class InvalidArgumentError extends Error {
    public readonly argument: string;

    constructor(argument: string, message: string) {
        super(message);
        this.name = 'InvalidArgumentError';
        this.argument = argument;
    }
}
