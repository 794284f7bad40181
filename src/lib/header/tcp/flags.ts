/** @see {@link TCP_HEADER} `flags` field */
export const TCP_FLAGS = {
    /** No more data from sender. */
    FIN: 0x01,
    /** Synchronize sequence numbers. */
    SYN: 0x02,
    /** Reset the connection. */
    RST: 0x04,
    /** Push function (see the Send Call description in [Section 3.9.1](https://datatracker.ietf.org/doc/html/rfc9293#user-api)) */
    PSH: 0x08,
    /** Acknowledgment field is significant. */
    ACK: 0x10,
    /** Urgent pointer field is significant. */
    URG: 0x20,
    /** ECN-Echo (see [[6](https://datatracker.ietf.org/doc/html/rfc3168)]) */
    ECE: 0x40,
    /** Congestion Window Reduced (see [[6](https://datatracker.ietf.org/doc/html/rfc3168)]). */
    CWR: 0x80,
} as const;

export type TCPFlagName = keyof typeof TCP_FLAGS;

/** rendering order, lowest bit first */
const TCP_FLAG_ORDER: readonly TCPFlagName[] = ["FIN", "SYN", "RST", "PSH", "ACK", "URG", "ECE", "CWR"];

/** rendered when no bit is set */
const UNINITIALIZED = "UNINT";

/**
 * The control bits of a TCP header. Every byte is a valid combination, values are never normalized.
 *
 * ```ts
 * let flags = TCPFlags.SYN.union(TCPFlags.ACK);
 * flags.toString() // "SYN | ACK 18"
 * ```
 */
export class TCPFlags {
    static readonly NONE = new TCPFlags(0);
    static readonly FIN = new TCPFlags(TCP_FLAGS.FIN);
    static readonly SYN = new TCPFlags(TCP_FLAGS.SYN);
    static readonly RST = new TCPFlags(TCP_FLAGS.RST);
    static readonly PSH = new TCPFlags(TCP_FLAGS.PSH);
    static readonly ACK = new TCPFlags(TCP_FLAGS.ACK);
    static readonly URG = new TCPFlags(TCP_FLAGS.URG);
    static readonly ECE = new TCPFlags(TCP_FLAGS.ECE);
    static readonly CWR = new TCPFlags(TCP_FLAGS.CWR);

    static fromByte(byte: number): TCPFlags {
        if (!Number.isInteger(byte) || byte < 0 || byte > 0xff) {
            throw new RangeError(`${byte} is not a byte`);
        }
        return new TCPFlags(byte);
    }

    static of(...names: TCPFlagName[]): TCPFlags {
        return new TCPFlags(names.reduce((bits, name) => bits | TCP_FLAGS[name], 0));
    }

    private constructor(private readonly bits: number) { }

    /** true if every bit of `flag` is set */
    contains(flag: TCPFlags): boolean {
        return (this.bits & flag.bits) == flag.bits;
    }

    union(other: TCPFlags): TCPFlags {
        return new TCPFlags(this.bits | other.bits);
    }

    remove(flag: TCPFlags): TCPFlags {
        return new TCPFlags(this.bits & ~flag.bits & 0xff);
    }

    equals(other: TCPFlags): boolean {
        return this.bits == other.bits;
    }

    toByte(): number {
        return this.bits;
    }

    names(): TCPFlagName[] {
        return TCP_FLAG_ORDER.filter(name => this.bits & TCP_FLAGS[name]);
    }

    toString(): string {
        let names = this.names();

        if (!names.length) {
            return `${UNINITIALIZED} ${this.bits}`;
        }

        return `${names.join(" | ")} ${this.bits}`;
    }

    toJSON(): TCPFlagName[] {
        return this.names();
    }
}
