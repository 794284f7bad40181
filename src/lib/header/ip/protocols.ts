/** Source: [IANA Protocol Numbers](https://www.iana.org/assignments/protocol-numbers/protocol-numbers.xhtml) */
export const PROTOCOLS = {
    ICMP: 1,
    TCP: 6,
    UDP: 17,
} as const;
