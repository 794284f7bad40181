import { UINT16, UINT8, defineStruct } from "../../binary/struct";
import type { IPV4Address } from "../../address/ipv4";
import { IPV4_ADDRESS } from "../../struct-types/address";
import { MalformedHeaderError } from "../errors";

/** Source <https://www.saminiir.com/lets-code-tcp-ip-stack-2-ipv4-icmpv4/> */
export const IPV4_HEADER = defineStruct({
    /** The 4-bit ```version``` field indicates the format of the Internet header. In our case, the value will be 4 for IPv4. */
    version: UINT8(4),
    /** The Internet Header Length field ```ihl``` indicates the number of 32-bit words in the IP header. The maximum length of an IP header is 60 octets. */
    ihl: UINT8(4),
    tos: UINT8,
    /** The total length field ```len``` communicates the length of the whole IP datagram. */
    len: UINT16,
    id: UINT16,
    flags: UINT16(3),
    fragOffset: UINT16(13),
    ttl: UINT8,
    /** The ```proto``` field, 6 for TCP */
    proto: UINT8,
    csum: UINT16,
    saddr: IPV4_ADDRESS,
    daddr: IPV4_ADDRESS,
});

export type IPV4Datagram = {
    saddr: IPV4Address;
    daddr: IPV4Address;
    proto: number;
    ttl: number;
    payload: Uint8Array;
};

/**
 * Unwraps a datagram as it is delivered by a raw socket.
 * Options are skipped using the ```ihl``` field, the payload ends at the total length.
 */
export function ipv4_read(bytes: Uint8Array): IPV4Datagram {
    let minSize = IPV4_HEADER.getMinSize();
    if (bytes.byteLength < minSize) {
        throw new MalformedHeaderError("IPv4", `expected at least ${minSize} bytes, received ${bytes.byteLength}`);
    }

    let hdr = IPV4_HEADER.from(bytes);

    if (hdr.get("version") != 4) {
        throw new MalformedHeaderError("IPv4", `unexpected version ${hdr.get("version")}`);
    }

    let headerLength = hdr.get("ihl") << 2;
    if (headerLength < minSize || headerLength > bytes.byteLength) {
        throw new MalformedHeaderError("IPv4", `invalid header length ${headerLength}`);
    }

    let totalLength = hdr.get("len");
    if (totalLength < headerLength) {
        throw new MalformedHeaderError("IPv4", `total length ${totalLength} is shorter than the header`);
    }

    return {
        saddr: hdr.get("saddr"),
        daddr: hdr.get("daddr"),
        proto: hdr.get("proto"),
        ttl: hdr.get("ttl"),
        payload: new Uint8Array(bytes.subarray(headerLength, Math.min(totalLength, bytes.byteLength))),
    };
}
