import { createClient, SupabaseClient } from "@supabase/supabase-js";
import {
    Candidate,
    CastVoteResult,
    ChannelRef,
    RegisteredUser,
    RequiredChannel,
    Survey,
    WelcomeScreen,
} from "../types";
import { formatChannelRef, parseChannelRef } from "./channels";
import type { SurveyPatch, SurveyStore, UserProfile } from "./db";
import { StoreError } from "./errors";

/* ---------- Row shapes as PostgREST returns them ---------- */

interface SurveyRow {
    id: number;
    title: string;
    description: string | null;
    image: string | null;
    active: boolean;
    created_at: string;
}

interface CandidateRow {
    id: number;
    survey_id: number;
    name: string;
    votes: number;
}

interface ChannelRow {
    id: number;
    survey_id: number;
    channel: string;
}

interface UserRow {
    id: number;
    username: string | null;
    full_name: string;
    first_seen_at: string;
}

interface PostgrestFailure {
    code?: string;
    message: string;
}

const PAGE_SIZE = 1000;
const UNIQUE_VIOLATION = "23505";
const WELCOME_KEY = "welcome_screen";

const CAST_VOTE_RESULTS: readonly CastVoteResult[] = ["accepted", "already_voted", "candidate_not_found", "survey_closed"];

const toSurvey = (row: SurveyRow): Survey => ({
    id: Number(row.id),
    title: row.title,
    description: row.description,
    image: row.image,
    active: Boolean(row.active),
    createdAt: Date.parse(row.created_at),
});

const toCandidate = (row: CandidateRow): Candidate => ({
    id: Number(row.id),
    surveyId: Number(row.survey_id),
    name: row.name,
    votes: Number(row.votes),
});

const toChannel = (row: ChannelRow): RequiredChannel => ({
    id: Number(row.id),
    surveyId: Number(row.survey_id),
    ref: parseChannelRef(row.channel),
});

const toUser = (row: UserRow): RegisteredUser => ({
    id: Number(row.id),
    username: row.username,
    fullName: row.full_name,
    firstSeenAt: Date.parse(row.first_seen_at),
});

function fail(operation: string, error: PostgrestFailure): never {
    throw new StoreError(`${operation} failed: ${error.message}`, true, { cause: error });
}

/**
 * Maps the `cast_vote` RPC response. A unique violation means a concurrent
 * attempt by the same user won the race.
 */
export function interpretCastVote(data: unknown, error: PostgrestFailure | null): CastVoteResult {
    if (error) {
        if (error.code === UNIQUE_VIOLATION) return "already_voted";
        fail("cast_vote", error);
    }
    const result = CAST_VOTE_RESULTS.find((r) => r === data);
    if (!result) throw new StoreError(`cast_vote returned unexpected value: ${String(data)}`, false);
    return result;
}

export class SupabaseSurveyStore implements SurveyStore {
    private readonly client: SupabaseClient;

    constructor(url: string, serviceKey: string) {
        this.client = createClient(url, serviceKey, {
            auth: { persistSession: false },
            global: { headers: { "x-client-info": "telegram-survey-bot" } },
        });
    }

    async createSurvey(title: string): Promise<Survey> {
        const { data, error } = await this.client.from("surveys").insert({ title }).select("*").single();
        if (error) fail("createSurvey", error);
        return toSurvey(data);
    }

    async getSurvey(id: number): Promise<Survey | null> {
        const { data, error } = await this.client.from("surveys").select("*").eq("id", id).maybeSingle();
        if (error) fail("getSurvey", error);
        return data ? toSurvey(data) : null;
    }

    async listSurveys(options: { activeOnly?: boolean } = {}): Promise<Survey[]> {
        let query = this.client.from("surveys").select("*");
        if (options.activeOnly) query = query.eq("active", true);
        const { data, error } = await query.order("id", { ascending: false });
        if (error) fail("listSurveys", error);
        return (data ?? []).map((row: SurveyRow) => toSurvey(row));
    }

    async updateSurvey(id: number, patch: SurveyPatch): Promise<Survey | null> {
        const row: Partial<Pick<SurveyRow, "description" | "image">> = {};
        if (patch.description !== undefined) row.description = patch.description;
        if (patch.image !== undefined) row.image = patch.image;
        const { data, error } = await this.client.from("surveys").update(row).eq("id", id).select("*").maybeSingle();
        if (error) fail("updateSurvey", error);
        return data ? toSurvey(data) : null;
    }

    async setSurveyActive(id: number, active: boolean): Promise<boolean> {
        const { data, error } = await this.client.from("surveys").update({ active }).eq("id", id).select("id");
        if (error) fail("setSurveyActive", error);
        return (data ?? []).length > 0;
    }

    async deleteSurvey(id: number): Promise<boolean> {
        // candidates, required_channels and voted_users go with it (ON DELETE CASCADE)
        const { data, error } = await this.client.from("surveys").delete().eq("id", id).select("id");
        if (error) fail("deleteSurvey", error);
        return (data ?? []).length > 0;
    }

    async addCandidate(surveyId: number, name: string): Promise<Candidate> {
        const { data, error } = await this.client
            .from("candidates")
            .insert({ survey_id: surveyId, name })
            .select("*")
            .single();
        if (error) fail("addCandidate", error);
        return toCandidate(data);
    }

    async getCandidate(id: number): Promise<Candidate | null> {
        const { data, error } = await this.client.from("candidates").select("*").eq("id", id).maybeSingle();
        if (error) fail("getCandidate", error);
        return data ? toCandidate(data) : null;
    }

    async listCandidates(surveyId: number): Promise<Candidate[]> {
        const { data, error } = await this.client
            .from("candidates")
            .select("*")
            .eq("survey_id", surveyId)
            .order("id", { ascending: true });
        if (error) fail("listCandidates", error);
        return (data ?? []).map((row: CandidateRow) => toCandidate(row));
    }

    async addRequiredChannel(surveyId: number, ref: ChannelRef): Promise<RequiredChannel> {
        const { data, error } = await this.client
            .from("required_channels")
            .insert({ survey_id: surveyId, channel: formatChannelRef(ref) })
            .select("*")
            .single();
        if (error) fail("addRequiredChannel", error);
        return toChannel(data);
    }

    async listRequiredChannels(surveyId: number): Promise<RequiredChannel[]> {
        const { data, error } = await this.client
            .from("required_channels")
            .select("*")
            .eq("survey_id", surveyId)
            .order("id", { ascending: true });
        if (error) fail("listRequiredChannels", error);
        return (data ?? []).map((row: ChannelRow) => toChannel(row));
    }

    async hasVoted(surveyId: number, userId: number): Promise<boolean> {
        const { data, error } = await this.client
            .from("voted_users")
            .select("user_id")
            .eq("survey_id", surveyId)
            .eq("user_id", userId)
            .maybeSingle();
        if (error) fail("hasVoted", error);
        return data !== null;
    }

    async castVote(surveyId: number, candidateId: number, userId: number): Promise<CastVoteResult> {
        // insert + increment run inside one Postgres function, i.e. one transaction
        const { data, error } = await this.client.rpc("cast_vote", {
            p_survey_id: surveyId,
            p_candidate_id: candidateId,
            p_user_id: userId,
        });
        return interpretCastVote(data, error);
    }

    async listVoters(surveyId: number): Promise<number[]> {
        const ids: number[] = [];
        for (let from = 0; ; from += PAGE_SIZE) {
            const { data, error } = await this.client
                .from("voted_users")
                .select("user_id")
                .eq("survey_id", surveyId)
                .order("user_id", { ascending: true })
                .range(from, from + PAGE_SIZE - 1);
            if (error) fail("listVoters", error);
            const page: { user_id: number }[] = data ?? [];
            ids.push(...page.map((r) => Number(r.user_id)));
            if (page.length < PAGE_SIZE) return ids;
        }
    }

    async upsertUser(profile: UserProfile): Promise<RegisteredUser> {
        // first_seen_at is left to its column default so re-registering keeps it
        const { data, error } = await this.client
            .from("users")
            .upsert({ id: profile.id, username: profile.username, full_name: profile.fullName }, { onConflict: "id" })
            .select("*")
            .single();
        if (error) fail("upsertUser", error);
        return toUser(data);
    }

    async listUserIds(): Promise<number[]> {
        const ids: number[] = [];
        for (let from = 0; ; from += PAGE_SIZE) {
            const { data, error } = await this.client
                .from("users")
                .select("id")
                .order("id", { ascending: true })
                .range(from, from + PAGE_SIZE - 1);
            if (error) fail("listUserIds", error);
            const page: { id: number }[] = data ?? [];
            ids.push(...page.map((r) => Number(r.id)));
            if (page.length < PAGE_SIZE) return ids;
        }
    }

    async countUsers(): Promise<number> {
        const { count, error } = await this.client.from("users").select("id", { count: "exact", head: true });
        if (error) fail("countUsers", error);
        return count ?? 0;
    }

    async getWelcomeScreen(): Promise<WelcomeScreen | null> {
        const { data, error } = await this.client.from("bot_settings").select("value").eq("key", WELCOME_KEY).maybeSingle();
        if (error) fail("getWelcomeScreen", error);
        if (!data || data.value === null) return null;
        const value: Partial<WelcomeScreen> = data.value;
        return typeof value.text === "string" ? { text: value.text, image: value.image ?? null } : null;
    }

    async setWelcomeScreen(screen: WelcomeScreen | null): Promise<void> {
        if (!screen) {
            const { error } = await this.client.from("bot_settings").delete().eq("key", WELCOME_KEY);
            if (error) fail("setWelcomeScreen", error);
            return;
        }
        const { error } = await this.client
            .from("bot_settings")
            .upsert({ key: WELCOME_KEY, value: screen }, { onConflict: "key" });
        if (error) fail("setWelcomeScreen", error);
    }

    async close(): Promise<void> {
        await this.client.removeAllChannels();
    }
}
