import { UINT16, UINT8, defineStruct } from "../../binary/struct";
import { IPV4_ADDRESS } from "../../struct-types/address";

/**
 * Source: [RFC 9293 3.1](https://datatracker.ietf.org/doc/html/rfc9293#v4pseudo)
 *
 * Conceptually prefixed to the transport header when calculating the checksum, never transmitted.
 *
 * ```txt
 *  +--------+--------+--------+--------+
 *  |           Source Address          |
 *  +--------+--------+--------+--------+
 *  |         Destination Address       |
 *  +--------+--------+--------+--------+
 *  |  zero  |  PTCL  |    TCP Length   |
 *  +--------+--------+--------+--------+
 * ```
 */
export const IPV4_PSEUDO_HEADER = defineStruct({
    saddr: IPV4_ADDRESS,
    daddr: IPV4_ADDRESS,
    zero: UINT8,
    proto: UINT8,
    /** length of the transport header and its data, in octets */
    len: UINT16,
});
