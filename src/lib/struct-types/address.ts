import type { BaseAddress } from "../address/base";
import { IPV4Address } from "../address/ipv4";
import type { StructType } from "../binary/struct";

type AddressClass<A extends BaseAddress> = {
    ADDRESS_LENGTH: number;
    new(input: Uint8Array): A;
};

export const defineAddress = <A extends BaseAddress>(Address: AddressClass<A>): StructType<A> => {
    return {
        bitLength: Address.ADDRESS_LENGTH,
        getter(buffer) {
            return new Address(buffer)
        },
        setter(value) {
            return value.buffer;
        },
    }
}

export const IPV4_ADDRESS = defineAddress(IPV4Address);
