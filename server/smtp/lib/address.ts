import { AddressInfo } from "node:net";

export function formatAddress(address: AddressInfo | string): string {
    const host = typeof address === "string" ? address : address.address;
    return host.includes(":") ? `[${ host }]` : host;
}

export function formatAddressPort(address: AddressInfo): string {
    return `${ formatAddress(address) }:${ address.port }`;
}
