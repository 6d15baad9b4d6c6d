/** Bad input from a user or admin. The message is shown back to them as-is. */
export class UserInputError extends Error {
    constructor(message: string) {
        super(message);
        this.name = "UserInputError";
    }
}

export class NotFoundError extends Error {
    constructor(
        readonly entity: "survey" | "candidate",
        readonly id: number,
    ) {
        super(`${entity} ${id} not found`);
        this.name = "NotFoundError";
    }
}

export class StoreError extends Error {
    constructor(
        message: string,
        readonly retryable = true,
        options?: { cause?: unknown },
    ) {
        super(message, options);
        this.name = "StoreError";
    }
}

export class TransportError extends Error {
    constructor(
        readonly recipient: number,
        options?: { cause?: unknown },
    ) {
        super(`Failed to deliver message to ${recipient}`, options);
        this.name = "TransportError";
    }
}

export class ConfigError extends Error {
    constructor(message: string) {
        super(message);
        this.name = "ConfigError";
    }
}
