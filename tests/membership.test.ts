import { describe, expect, it } from "vitest";
import { parseChannelRef } from "../src/utils/channels";
import { MembershipVerifier } from "../src/utils/membership";
import { RequiredChannel } from "../src/types";
import { FakeMembership } from "./helpers";

const channel = (id: number, raw: string): RequiredChannel => ({ id, surveyId: 1, ref: parseChannelRef(raw) });

describe("MembershipVerifier", () => {
    it("accepts members, administrators and creators only", async () => {
        const fake = new FakeMembership();
        const verifier = new MembershipVerifier(fake.lookup);
        const ref = parseChannelRef("@req1");
        const expectations: [string, boolean][] = [
            ["member", true],
            ["administrator", true],
            ["creator", true],
            ["restricted", false],
            ["left", false],
            ["kicked", false],
        ];
        for (const [status, expected] of expectations) {
            fake.set("@req1", 7, status);
            expect(await verifier.isMember(7, ref)).toBe(expected);
        }
    });

    it("treats lookup errors as not joined", async () => {
        const fake = new FakeMembership();
        fake.set("@req1", 7, "member");
        fake.failing.add("@req1");
        const verifier = new MembershipVerifier(fake.lookup);
        expect(await verifier.isMember(7, parseChannelRef("@req1"))).toBe(false);
    });

    it("never looks up links it cannot normalize", async () => {
        const fake = new FakeMembership();
        const verifier = new MembershipVerifier(fake.lookup);
        expect(await verifier.isMember(7, parseChannelRef("https://t.me/myChannel/123"))).toBe(false);
        expect(fake.calls).toBe(0);
    });

    it("checks numeric chats by id", async () => {
        const fake = new FakeMembership();
        fake.set(-1001234567890, 7, "member");
        const verifier = new MembershipVerifier(fake.lookup);
        expect(await verifier.isMember(7, parseChannelRef("-1001234567890"))).toBe(true);
    });

    it("reports every missing channel, in order", async () => {
        const fake = new FakeMembership();
        fake.set("@a", 7, "member");
        fake.set("@c", 7, "member");
        fake.failing.add("@c");
        const verifier = new MembershipVerifier(fake.lookup);
        const channels = [channel(1, "@a"), channel(2, "@b"), channel(3, "@c"), channel(4, "@d")];
        const missing = await verifier.findMissing(7, channels);
        expect(missing.map((c) => c.id)).toEqual([2, 3, 4]);
        expect(fake.calls).toBe(4);
    });

    it("does not cache results between calls", async () => {
        const fake = new FakeMembership();
        const verifier = new MembershipVerifier(fake.lookup);
        const ref = parseChannelRef("@req1");
        expect(await verifier.isMember(7, ref)).toBe(false);
        fake.set("@req1", 7, "member");
        expect(await verifier.isMember(7, ref)).toBe(true);
        fake.set("@req1", 7, "left");
        expect(await verifier.isMember(7, ref)).toBe(false);
    });
});
