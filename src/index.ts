export { IPV4Address } from "./lib/address/ipv4";
export { StructValueError } from "./lib/binary/struct";
export { calculateChecksum } from "./lib/binary/checksum";
export * from "./lib/header/errors";
export { PROTOCOLS, ipv4_read, type IPV4Datagram } from "./lib/header/ip";
export * from "./lib/header/tcp";
export { Logger, logger } from "./lib/log";
