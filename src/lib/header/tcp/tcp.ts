/**
 * Source:
 * RFC 9293
 *
 */

import { UINT16, UINT32, UINT8, defineStruct } from "../../binary/struct";
import { MalformedHeaderError } from "../errors";
import { TCPFlags } from "./flags";

/**
 * Source: [RFC 9293](https://datatracker.ietf.org/doc/html/rfc9293)
 *
 * ```txt
 *   0                   1                   2                   3
 *   0 1 2 3 4 5 6 7 8 9 0 1 2 3 4 5 6 7 8 9 0 1 2 3 4 5 6 7 8 9 0 1
 *  +-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+
 *  |          Source Port          |       Destination Port        |
 *  +-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+
 *  |                        Sequence Number                        |
 *  +-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+
 *  |                    Acknowledgment Number                      |
 *  +-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+
 *  |  Data |       |C|E|U|A|P|R|S|F|                               |
 *  | Offset| Rsrvd |W|C|R|C|S|S|Y|I|            Window             |
 *  |       |       |R|E|G|K|H|T|N|N|                               |
 *  +-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+
 *  |           Checksum            |         Urgent Pointer        |
 *  +-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+
 * ```
 *
 * Options are not supported, the header is always 20 octets.
 */
export const TCP_HEADER = defineStruct({
    /** The source port number. */
    sport: UINT16,

    /** The destination port number. */
    dport: UINT16,

    /** The sequence number of the first data octet in this segment (except when the SYN flag is set). If SYN is set, the sequence number is the initial sequence number (ISN) and the first data octet is ISN+1. */
    seqnum: UINT32,

    /** If the ACK control bit is set, this field contains the value of the next sequence number the sender of the segment is expecting to receive. */
    acknum: UINT32,

    /** The number of 32-bit words in the TCP header. */
    doffset: UINT8(4),

    /** Must be zero in generated segments. */
    rsrvd: UINT8(4),

    /** The control bits, see {@link TCPFlags} */
    flags: UINT8,

    /** The number of data octets the sender of this segment is willing to accept. */
    window: UINT16,

    /** The 16-bit ones' complement of the ones' complement sum of the pseudo-header, the header and the data. */
    csum: UINT16,

    /** Urgent data is not supported, always zero. */
    urgpnt: UINT16,
});

export const TCP_HEADER_LENGTH = TCP_HEADER.getMinSize();

/** data offset of a header without options, in 32-bit words */
export const TCP_DATA_OFFSET = TCP_HEADER_LENGTH >> 2;

export type TCPHeader = {
    readonly sport: number;
    readonly dport: number;
    readonly seqnum: number;
    readonly acknum: number;
    readonly flags: TCPFlags;
    readonly window: number;
    /** caller supplied, never re-derived when decoding */
    readonly csum: number;
};

/**
 * @throws {StructValueError} if a field does not fit its bits
 */
export function tcp_serialize(header: TCPHeader): Uint8Array {
    return TCP_HEADER.create({
        sport: header.sport,
        dport: header.dport,
        seqnum: header.seqnum,
        acknum: header.acknum,
        doffset: TCP_DATA_OFFSET,
        rsrvd: 0,
        flags: header.flags.toByte(),
        window: header.window,
        csum: header.csum,
        urgpnt: 0,
    }).getBuffer();
}

/**
 * Reads the header from the first 20 bytes, the flags are always read from octet 13.
 * Neither the flags nor the checksum are validated.
 */
export function tcp_deserialize(bytes: Uint8Array): TCPHeader {
    if (bytes.byteLength < TCP_HEADER_LENGTH) {
        throw new MalformedHeaderError("TCP", `expected at least ${TCP_HEADER_LENGTH} bytes, received ${bytes.byteLength}`);
    }

    let hdr = TCP_HEADER.from(bytes);

    return {
        sport: hdr.get("sport"),
        dport: hdr.get("dport"),
        seqnum: hdr.get("seqnum"),
        acknum: hdr.get("acknum"),
        flags: TCPFlags.fromByte(hdr.get("flags")),
        window: hdr.get("window"),
        csum: hdr.get("csum"),
    };
}

export function tcp_headerEquals(a: TCPHeader, b: TCPHeader): boolean {
    return a.sport == b.sport
        && a.dport == b.dport
        && a.seqnum == b.seqnum
        && a.acknum == b.acknum
        && a.flags.equals(b.flags)
        && a.window == b.window
        && a.csum == b.csum;
}

export function tcp_describe(header: TCPHeader): string {
    return [
        "TCP Header:",
        `    Source Port: ${header.sport}`,
        `    Destination Port: ${header.dport}`,
        `    Sequence Number: ${header.seqnum}`,
        `    Acknowledge Number: ${header.acknum}`,
        `    Flags: ${header.flags}`,
        `    Window: ${header.window}`,
        `    Checksum: 0x${header.csum.toString(16).padStart(4, "0")}`,
    ].join("\n");
}
