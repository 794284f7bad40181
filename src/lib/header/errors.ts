export class HeaderError extends Error {
    constructor(public header: string, message: string) {
        super(`${header}: ${message}`);
        this.name = "HeaderError";
    }
}

/** The bytes can not be read as the header, the header is never zero-padded to fit */
export class MalformedHeaderError extends HeaderError {
    constructor(header: string, public reason: string) {
        super(header, `malformed header; ${reason}`);
        this.name = "MalformedHeaderError";
    }
}

/**
 * The stored checksum does not match the computed one.
 * Returned by the verifying functions next to the decoded data, not thrown.
 */
export class ChecksumMismatchError extends HeaderError {
    constructor(header: string, public expected: number, public received: number) {
        super(header, `checksum mismatch; expected 0x${hex16(expected)}, received 0x${hex16(received)}`);
        this.name = "ChecksumMismatchError";
    }
}

/** The length does not fit the 16-bit length field of the pseudo-header */
export class LengthOverflowError extends HeaderError {
    constructor(header: string, public length: number, public max: number) {
        super(header, `length ${length} exceeds ${max}`);
        this.name = "LengthOverflowError";
    }
}

function hex16(n: number): string {
    return n.toString(16).padStart(4, "0");
}
