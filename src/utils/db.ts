import { AppConfig } from "../config";
import {
    Candidate,
    CastVoteResult,
    ChannelRef,
    RegisteredUser,
    RequiredChannel,
    Survey,
    WelcomeScreen,
} from "../types";
import { FileSurveyStore } from "./fileStore";
import { logger } from "./logger";
import { SupabaseSurveyStore } from "./supabaseStore";

export interface SurveyPatch {
    description?: string | null;
    image?: string | null;
}

export interface UserProfile {
    id: number;
    username: string | null;
    fullName: string;
}

/**
 * Persistence for surveys and their owned rows. Deleting a survey removes its
 * candidates, required channels and voted records with it.
 */
export interface SurveyStore {
    createSurvey(title: string): Promise<Survey>;
    getSurvey(id: number): Promise<Survey | null>;
    /** Newest first. */
    listSurveys(options?: { activeOnly?: boolean }): Promise<Survey[]>;
    updateSurvey(id: number, patch: SurveyPatch): Promise<Survey | null>;
    /** Returns false when the survey does not exist. */
    setSurveyActive(id: number, active: boolean): Promise<boolean>;
    deleteSurvey(id: number): Promise<boolean>;

    addCandidate(surveyId: number, name: string): Promise<Candidate>;
    getCandidate(id: number): Promise<Candidate | null>;
    /** Creation order. */
    listCandidates(surveyId: number): Promise<Candidate[]>;

    addRequiredChannel(surveyId: number, ref: ChannelRef): Promise<RequiredChannel>;
    listRequiredChannels(surveyId: number): Promise<RequiredChannel[]>;

    hasVoted(surveyId: number, userId: number): Promise<boolean>;
    /**
     * Accept path: records (survey, user) and increments the candidate by one
     * as a single unit. A second call for the same pair yields "already_voted".
     */
    castVote(surveyId: number, candidateId: number, userId: number): Promise<CastVoteResult>;
    listVoters(surveyId: number): Promise<number[]>;

    upsertUser(profile: UserProfile): Promise<RegisteredUser>;
    listUserIds(): Promise<number[]>;
    countUsers(): Promise<number>;

    getWelcomeScreen(): Promise<WelcomeScreen | null>;
    setWelcomeScreen(screen: WelcomeScreen | null): Promise<void>;

    close(): Promise<void>;
}

export function createStore(config: AppConfig): SurveyStore {
    if (config.supabase) {
        logger.info("Using Supabase store");
        return new SupabaseSurveyStore(config.supabase.url, config.supabase.serviceKey);
    }
    logger.info(`Using file store at ${config.dbPath}`);
    return new FileSurveyStore(config.dbPath);
}
