import { FileSurveyStore } from "../src/utils/fileStore";
import { SurveyLifecycleManager } from "../src/utils/lifecycle";
import { ChatMemberLookup, MembershipVerifier } from "../src/utils/membership";
import { VotingEngine } from "../src/utils/votingEngine";

/**
 * In-process stand-in for Telegram's getChatMember: statuses per chat and user.
 * A chat listed in `failing` throws like an unreachable API.
 */
export class FakeMembership {
    private readonly statuses = new Map<string, string>();
    readonly failing = new Set<string>();
    calls = 0;

    set(chat: string | number, userId: number, status: string) {
        this.statuses.set(`${chat}|${userId}`, status);
    }

    lookup: ChatMemberLookup = async (chat, userId) => {
        this.calls += 1;
        if (this.failing.has(String(chat))) throw new Error("Bad Request: chat not found");
        return { status: this.statuses.get(`${chat}|${userId}`) ?? "left" };
    };
}

export interface Harness {
    store: FileSurveyStore;
    membership: FakeMembership;
    engine: VotingEngine;
    lifecycle: SurveyLifecycleManager;
    sent: { userId: number; text: string }[];
    blocked: Set<number>;
}

export function createHarness(): Harness {
    const store = new FileSurveyStore(null);
    const membership = new FakeMembership();
    const sent: { userId: number; text: string }[] = [];
    const blocked = new Set<number>();
    const engine = new VotingEngine(store, new MembershipVerifier(membership.lookup));
    const lifecycle = new SurveyLifecycleManager(store, {
        delayMs: 0,
        notify: async (userId, text) => {
            if (blocked.has(userId)) throw new Error("Forbidden: bot was blocked by the user");
            sent.push({ userId, text });
        },
    });
    return { store, membership, engine, lifecycle, sent, blocked };
}
