import type { IPV4Address } from "../../address/ipv4";
import { uint8_concat } from "../../binary/uint8-array";
import { tcp_checksum } from "./checksum";
import { TCPFlags } from "./flags";
import { tcp_serialize, type TCPHeader } from "./tcp";

export const DEFAULT_WINDOW_SIZE = 1024;

/**
 * Collects the header fields, every field has a default so any partial configuration is valid.
 *
 * ```ts
 * let hdr = new TCPHeaderBuilder()
 *     .dport(8080)
 *     .flags(TCPFlags.SYN)
 *     .build(saddr, daddr, payload);
 * ```
 */
export class TCPHeaderBuilder {
    private values: Omit<TCPHeader, "csum"> = {
        sport: 0,
        dport: 0,
        seqnum: 0,
        acknum: 0,
        flags: TCPFlags.NONE,
        window: DEFAULT_WINDOW_SIZE,
    };

    sport(port: number): this {
        this.values = { ...this.values, sport: port };
        return this;
    }

    dport(port: number): this {
        this.values = { ...this.values, dport: port };
        return this;
    }

    seqnum(seq: number): this {
        this.values = { ...this.values, seqnum: seq };
        return this;
    }

    acknum(ack: number): this {
        this.values = { ...this.values, acknum: ack };
        return this;
    }

    flags(flags: TCPFlags): this {
        this.values = { ...this.values, flags };
        return this;
    }

    window(size: number): this {
        this.values = { ...this.values, window: size };
        return this;
    }

    /**
     * Creates the header with its checksum calculated over the pseudo-header, the header and `payload`.
     * The builder can be reused afterwards.
     */
    build(saddr: IPV4Address, daddr: IPV4Address, payload: Uint8Array): TCPHeader {
        let provisional: TCPHeader = { ...this.values, csum: 0 };

        return {
            ...provisional,
            csum: tcp_checksum(saddr, daddr, provisional, payload),
        };
    }
}

/** The serialized header followed by the payload, the checksum is not recalculated */
export function tcp_assembleSegment(header: TCPHeader, payload: Uint8Array): Uint8Array {
    return uint8_concat([tcp_serialize(header), payload]);
}
