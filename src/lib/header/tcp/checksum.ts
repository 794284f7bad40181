import type { IPV4Address } from "../../address/ipv4";
import { uint16_complement, uint16_sum } from "../../binary/checksum";
import { ChecksumMismatchError, LengthOverflowError } from "../errors";
import { IPV4_PSEUDO_HEADER, PROTOCOLS } from "../ip";
import { TCP_HEADER_LENGTH, tcp_serialize, type TCPHeader } from "./tcp";

/** largest value the pseudo-header length field can carry */
export const TCP_MAX_LENGTH = 0xffff;

/**
 * 16-bit ones' complement of the ones' complement sum of the IPv4 pseudo-header,
 * the header with its checksum field zeroed, and the payload.
 * An odd payload is padded with a zero octet on its right, the pad is never read from the buffer.
 *
 * @throws {LengthOverflowError} if the header and payload do not fit the pseudo-header length field
 */
export function tcp_checksum(saddr: IPV4Address, daddr: IPV4Address, header: TCPHeader, payload: Uint8Array): number {
    let len = TCP_HEADER_LENGTH + payload.byteLength;
    if (len > TCP_MAX_LENGTH) {
        throw new LengthOverflowError("TCP", len, TCP_MAX_LENGTH);
    }

    let pseudoHdr = IPV4_PSEUDO_HEADER.create({
        saddr,
        daddr,
        proto: PROTOCOLS.TCP,
        len,
    });

    let sum = uint16_sum(pseudoHdr.getBuffer());
    sum = uint16_sum(tcp_serialize({ ...header, csum: 0 }), sum);
    sum = uint16_sum(payload, sum);

    return uint16_complement(sum);
}

/**
 * Compares the stored checksum with a freshly computed one.
 * @returns the mismatch, or `null` if the checksums are equal
 */
export function tcp_verify(saddr: IPV4Address, daddr: IPV4Address, header: TCPHeader, payload: Uint8Array): ChecksumMismatchError | null {
    let expected = tcp_checksum(saddr, daddr, header, payload);

    if (expected != header.csum) {
        return new ChecksumMismatchError("TCP", expected, header.csum);
    }

    return null;
}
