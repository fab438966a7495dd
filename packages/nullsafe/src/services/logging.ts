/******************************************************************************
 * Copyright 2024 TypeFox GmbH
 * This program and the accompanying materials are made available under the
 * terms of the MIT License, which is available in the project root.
 ******************************************************************************/

export interface Logger {
    debug(message: string): void;
    info(message: string): void;
    warn(message: string): void;
    error(message: string): void;
}

/**
 * Discards all messages. This is the default, since checks usually run inside of other tools with their own logging.
 */
export class NullLogger implements Logger {
    debug(_message: string): void {}
    info(_message: string): void {}
    warn(_message: string): void {}
    error(_message: string): void {}
}

export class ConsoleLogger implements Logger {
    protected readonly prefix: string;
    protected readonly verbose: boolean;

    constructor(options?: { prefix?: string; verbose?: boolean }) {
        this.prefix = options?.prefix ?? '[nullsafe]';
        this.verbose = options?.verbose ?? false;
    }

    debug(message: string): void {
        if (this.verbose) {
            console.debug(`${this.prefix} ${message}`);
        }
    }

    info(message: string): void {
        console.info(`${this.prefix} ${message}`);
    }

    warn(message: string): void {
        console.warn(`${this.prefix} ${message}`);
    }

    error(message: string): void {
        console.error(`${this.prefix} ${message}`);
    }
}
