import { ChannelRef, RequiredChannel } from "../types";
import { formatChannelRef, lookupTarget } from "./channels";
import { logger } from "./logger";

/** Same shape as grammy's `api.getChatMember`. */
export type ChatMemberLookup = (chat: string | number, userId: number) => Promise<{ status: string }>;

export const MEMBER_STATUSES: ReadonlySet<string> = new Set(["member", "administrator", "creator"]);

export class MembershipVerifier {
    constructor(private readonly lookup: ChatMemberLookup) {}

    // No caching: membership can change between two taps.
    async isMember(userId: number, ref: ChannelRef): Promise<boolean> {
        const target = lookupTarget(ref);
        if (target === null) {
            logger.debug("Channel cannot be verified, treating as not joined", { channel: formatChannelRef(ref) });
            return false;
        }
        try {
            const member = await this.lookup(target, userId);
            return MEMBER_STATUSES.has(member.status);
        } catch (err) {
            logger.warn("Membership lookup failed, treating as not joined", {
                channel: formatChannelRef(ref),
                userId,
                error: err instanceof Error ? err.message : String(err),
            });
            return false;
        }
    }

    /** Channels the user has not joined, in the order given. */
    async findMissing(userId: number, channels: RequiredChannel[]): Promise<RequiredChannel[]> {
        const joined = await Promise.all(channels.map((c) => this.isMember(userId, c.ref)));
        return channels.filter((_, i) => !joined[i]);
    }
}
