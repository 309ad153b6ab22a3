import { describe, expect, test } from "@jest/globals";
import { formatAddress, formatAddressPort } from "./address";

describe("Test address formatting", () => {
    test("Check IPv4 address", () => {
        expect(formatAddressPort({ address: "127.0.0.1", port: 2525, family: "IPv4" })).toEqual("127.0.0.1:2525");
    });

    test("Check IPv6 address is bracketed", () => {
        expect(formatAddressPort({ address: "::1", port: 2525, family: "IPv6" })).toEqual("[::1]:2525");
        expect(formatAddress("fe80::1")).toEqual("[fe80::1]");
    });

    test("Check host name", () => {
        expect(formatAddress("localhost")).toEqual("localhost");
    });
});
