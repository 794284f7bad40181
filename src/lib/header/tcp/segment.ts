import type { IPV4Address } from "../../address/ipv4";
import { logger } from "../../log";
import { ChecksumMismatchError, MalformedHeaderError } from "../errors";
import { PROTOCOLS, ipv4_read } from "../ip";
import { tcp_assembleSegment } from "./builder";
import { tcp_verify } from "./checksum";
import { TCP_HEADER_LENGTH, tcp_deserialize, type TCPHeader } from "./tcp";

export type TCPSegment = {
    header: TCPHeader;
    payload: Uint8Array;
};

export type VerifiedTCPSegment = TCPSegment & {
    /** `null` when the checksum is correct, the segment is returned either way */
    mismatch: ChecksumMismatchError | null;
};

/**
 * The byte oriented transport the segments are handed to, e.g. a raw socket.
 * `destination` and `source` are the IP level addresses.
 */
export interface SegmentTransport {
    send(bytes: Uint8Array, destination: IPV4Address): Promise<void>;
    receive(): Promise<{ bytes: Uint8Array; source: IPV4Address }>;
}

export type ReceiveOptions = {
    /** the transport delivers whole IPv4 datagrams, as raw sockets do */
    ipv4?: boolean;
    /** verify the checksum against the source and local address */
    verify?: boolean;
};

export type ReceivedTCPSegment = VerifiedTCPSegment & {
    source: IPV4Address;
};

/** Options are not supported, the payload always starts at octet 20. The payload is a copy */
export function tcp_parseSegment(bytes: Uint8Array): TCPSegment {
    return {
        header: tcp_deserialize(bytes),
        payload: new Uint8Array(bytes.subarray(TCP_HEADER_LENGTH)),
    };
}

export function tcp_parseAndVerify(bytes: Uint8Array, saddr: IPV4Address, daddr: IPV4Address): VerifiedTCPSegment {
    let { header, payload } = tcp_parseSegment(bytes);

    return {
        header,
        payload,
        mismatch: tcp_verify(saddr, daddr, header, payload),
    };
}

export async function tcp_send(transport: SegmentTransport, daddr: IPV4Address, header: TCPHeader, payload: Uint8Array): Promise<void> {
    logger.segment("→", daddr.toString(), header, payload.byteLength);
    await transport.send(tcp_assembleSegment(header, payload), daddr);
}

/**
 * Waits for the next segment on `transport`.
 * @param local the address of this host, the checksum is verified against it even when the datagram names another destination
 */
export async function tcp_receive(transport: SegmentTransport, local: IPV4Address, options: ReceiveOptions = {}): Promise<ReceivedTCPSegment> {
    let { bytes, source } = await transport.receive();

    if (options.ipv4) {
        let datagram = ipv4_read(bytes);
        if (datagram.proto != PROTOCOLS.TCP) {
            throw new MalformedHeaderError("IPv4", `expected protocol ${PROTOCOLS.TCP}, received ${datagram.proto}`);
        }

        source = datagram.saddr;
        bytes = datagram.payload;
    }

    let { header, payload } = tcp_parseSegment(bytes);
    logger.segment("←", source.toString(), header, payload.byteLength);

    let mismatch = options.verify ? tcp_verify(source, local, header, payload) : null;
    if (mismatch) {
        logger.warn(mismatch.message, { source: source.toString() });
    }

    return { header, payload, source, mismatch };
}
