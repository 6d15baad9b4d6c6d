import fs from "fs";
import path from "path";
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

interface ChannelRow {
    id: number;
    surveyId: number;
    channel: string;
}

interface VoteRow {
    surveyId: number;
    userId: number;
    createdAt: number;
}

interface FileData {
    sequences: { surveys: number; candidates: number; channels: number };
    surveys: Record<string, Survey>;
    candidates: Record<string, Candidate>;
    channels: Record<string, ChannelRow>;
    votes: Record<string, VoteRow>;
    users: Record<string, RegisteredUser>;
    welcome: WelcomeScreen | null;
}

const emptyData = (): FileData => ({
    sequences: { surveys: 0, candidates: 0, channels: 0 },
    surveys: {},
    candidates: {},
    channels: {},
    votes: {},
    users: {},
    welcome: null,
});

const voteKey = (surveyId: number, userId: number) => `${surveyId}:${userId}`;

const toChannel = (row: ChannelRow): RequiredChannel => ({
    id: row.id,
    surveyId: row.surveyId,
    ref: parseChannelRef(row.channel),
});

/**
 * JSON file store for local development. Pass `null` for a purely in-memory
 * store (tests).
 *
 * Every mutation runs synchronously from check to write, so two concurrent
 * castVote calls cannot both see "not voted yet".
 */
export class FileSurveyStore implements SurveyStore {
    private data: FileData;

    constructor(private readonly filePath: string | null) {
        this.data = filePath ? this.load(filePath) : emptyData();
    }

    private load(filePath: string): FileData {
        const dir = path.dirname(filePath);
        if (!fs.existsSync(dir)) fs.mkdirSync(dir, { recursive: true });
        if (!fs.existsSync(filePath)) {
            const fresh = emptyData();
            fs.writeFileSync(filePath, JSON.stringify(fresh, null, 2), "utf8");
            return fresh;
        }
        const stored: Partial<FileData> = JSON.parse(fs.readFileSync(filePath, "utf8"));
        return { ...emptyData(), ...stored };
    }

    private persist() {
        if (!this.filePath) return;
        fs.writeFileSync(this.filePath, JSON.stringify(this.data, null, 2), "utf8");
    }

    async createSurvey(title: string): Promise<Survey> {
        const id = ++this.data.sequences.surveys;
        const survey: Survey = { id, title, description: null, image: null, active: true, createdAt: Date.now() };
        this.data.surveys[id] = survey;
        this.persist();
        return { ...survey };
    }

    async getSurvey(id: number): Promise<Survey | null> {
        const survey = this.data.surveys[id];
        return survey ? { ...survey } : null;
    }

    async listSurveys(options: { activeOnly?: boolean } = {}): Promise<Survey[]> {
        return Object.values(this.data.surveys)
            .filter((s) => !options.activeOnly || s.active)
            .sort((a, b) => b.id - a.id)
            .map((s) => ({ ...s }));
    }

    async updateSurvey(id: number, patch: SurveyPatch): Promise<Survey | null> {
        const survey = this.data.surveys[id];
        if (!survey) return null;
        if (patch.description !== undefined) survey.description = patch.description;
        if (patch.image !== undefined) survey.image = patch.image;
        this.persist();
        return { ...survey };
    }

    async setSurveyActive(id: number, active: boolean): Promise<boolean> {
        const survey = this.data.surveys[id];
        if (!survey) return false;
        survey.active = active;
        this.persist();
        return true;
    }

    async deleteSurvey(id: number): Promise<boolean> {
        if (!this.data.surveys[id]) return false;
        delete this.data.surveys[id];
        for (const [key, c] of Object.entries(this.data.candidates)) {
            if (c.surveyId === id) delete this.data.candidates[key];
        }
        for (const [key, ch] of Object.entries(this.data.channels)) {
            if (ch.surveyId === id) delete this.data.channels[key];
        }
        for (const [key, v] of Object.entries(this.data.votes)) {
            if (v.surveyId === id) delete this.data.votes[key];
        }
        this.persist();
        return true;
    }

    async addCandidate(surveyId: number, name: string): Promise<Candidate> {
        const id = ++this.data.sequences.candidates;
        const candidate: Candidate = { id, surveyId, name, votes: 0 };
        this.data.candidates[id] = candidate;
        this.persist();
        return { ...candidate };
    }

    async getCandidate(id: number): Promise<Candidate | null> {
        const candidate = this.data.candidates[id];
        return candidate ? { ...candidate } : null;
    }

    async listCandidates(surveyId: number): Promise<Candidate[]> {
        return Object.values(this.data.candidates)
            .filter((c) => c.surveyId === surveyId)
            .sort((a, b) => a.id - b.id)
            .map((c) => ({ ...c }));
    }

    async addRequiredChannel(surveyId: number, ref: ChannelRef): Promise<RequiredChannel> {
        const id = ++this.data.sequences.channels;
        const row: ChannelRow = { id, surveyId, channel: formatChannelRef(ref) };
        this.data.channels[id] = row;
        this.persist();
        return toChannel(row);
    }

    async listRequiredChannels(surveyId: number): Promise<RequiredChannel[]> {
        return Object.values(this.data.channels)
            .filter((c) => c.surveyId === surveyId)
            .sort((a, b) => a.id - b.id)
            .map(toChannel);
    }

    async hasVoted(surveyId: number, userId: number): Promise<boolean> {
        return voteKey(surveyId, userId) in this.data.votes;
    }

    async castVote(surveyId: number, candidateId: number, userId: number): Promise<CastVoteResult> {
        const candidate = this.data.candidates[candidateId];
        if (!candidate || candidate.surveyId !== surveyId) return "candidate_not_found";
        if (!this.data.surveys[surveyId]?.active) return "survey_closed";
        const key = voteKey(surveyId, userId);
        if (key in this.data.votes) return "already_voted";
        this.data.votes[key] = { surveyId, userId, createdAt: Date.now() };
        candidate.votes += 1;
        this.persist();
        return "accepted";
    }

    async listVoters(surveyId: number): Promise<number[]> {
        return Object.values(this.data.votes)
            .filter((v) => v.surveyId === surveyId)
            .map((v) => v.userId);
    }

    async upsertUser(profile: UserProfile): Promise<RegisteredUser> {
        const existing = this.data.users[profile.id];
        const user: RegisteredUser = {
            id: profile.id,
            username: profile.username,
            fullName: profile.fullName,
            firstSeenAt: existing?.firstSeenAt ?? Date.now(),
        };
        this.data.users[profile.id] = user;
        this.persist();
        return { ...user };
    }

    async listUserIds(): Promise<number[]> {
        return Object.values(this.data.users).map((u) => u.id);
    }

    async countUsers(): Promise<number> {
        return Object.keys(this.data.users).length;
    }

    async getWelcomeScreen(): Promise<WelcomeScreen | null> {
        return this.data.welcome ? { ...this.data.welcome } : null;
    }

    async setWelcomeScreen(screen: WelcomeScreen | null): Promise<void> {
        this.data.welcome = screen ? { ...screen } : null;
        this.persist();
    }

    async close(): Promise<void> {
        this.persist();
    }
}
