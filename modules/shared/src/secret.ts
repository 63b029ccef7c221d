/**
 * Student Provisioning - Secret Values
 *
 * Wraps a plaintext secret in a buffer that can be wiped, and that never
 * shows up in logs, JSON or `util.inspect` output.
 */

import { inspect } from 'node:util';

const REDACTED = '[REDACTED]';

export class Secret {
    private readonly bytes: Buffer;
    private wiped = false;

    constructor(plaintext: string) {
        this.bytes = Buffer.from(plaintext, 'utf-8');
    }

    /**
     * Run `fn` with the plaintext. The string handed to `fn` cannot be
     * wiped, so keep its use short and do not store it.
     *
     * @throws Error if the secret was already wiped
     */
    expose<T>(fn: (plaintext: string) => T): T {
        if (this.wiped) {
            throw new Error('Secret has already been wiped');
        }
        return fn(this.bytes.toString('utf-8'));
    }

    /** Copy of the UTF-8 bytes. The caller must wipe the copy. */
    toBuffer(): Buffer {
        if (this.wiped) {
            throw new Error('Secret has already been wiped');
        }
        return Buffer.from(this.bytes);
    }

    get isWiped(): boolean {
        return this.wiped;
    }

    wipe(): void {
        this.bytes.fill(0);
        this.wiped = true;
    }

    toString(): string {
        return REDACTED;
    }

    toJSON(): string {
        return REDACTED;
    }

    [inspect.custom](): string {
        return REDACTED;
    }
}

/**
 * Zero-fill every buffer passed in.
 */
export function wipeBuffers(...buffers: Buffer[]): void {
    for (const buffer of buffers) {
        buffer.fill(0);
    }
}
