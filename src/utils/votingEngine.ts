import { MembershipOutcome, VoteOutcome } from "../types";
import { SurveyStore } from "./db";
import { logger } from "./logger";
import { MembershipVerifier } from "./membership";

export interface VoteAttempt {
    /** When given, the candidate must belong to this survey. */
    surveyId?: number;
    candidateId: number;
    userId: number;
}

/**
 * One vote per (survey, user), gated on membership of every required channel.
 *
 * The membership check is read-only and may run any number of times; only
 * `store.castVote` writes, and the store guarantees it succeeds at most once
 * per (survey, user).
 */
export class VotingEngine {
    constructor(
        private readonly store: SurveyStore,
        private readonly verifier: MembershipVerifier,
    ) {}

    async attemptVote({ surveyId, candidateId, userId }: VoteAttempt): Promise<VoteOutcome> {
        const candidate = await this.store.getCandidate(candidateId);
        if (!candidate || (surveyId !== undefined && candidate.surveyId !== surveyId)) {
            return { kind: "candidate_not_found", candidateId };
        }

        const survey = await this.store.getSurvey(candidate.surveyId);
        if (!survey) return { kind: "candidate_not_found", candidateId };
        if (!survey.active) return { kind: "survey_closed", surveyId: survey.id };

        if (await this.store.hasVoted(survey.id, userId)) {
            return { kind: "already_voted", surveyId: survey.id };
        }

        const channels = await this.store.listRequiredChannels(survey.id);
        const missing = await this.verifier.findMissing(userId, channels);
        if (missing.length > 0) {
            return { kind: "membership_required", surveyId: survey.id, candidateId, missing };
        }

        const result = await this.store.castVote(survey.id, candidateId, userId);
        switch (result) {
            case "already_voted":
                logger.debug("Concurrent vote lost the race", { surveyId: survey.id, userId });
                return { kind: "already_voted", surveyId: survey.id };
            case "survey_closed":
                return { kind: "survey_closed", surveyId: survey.id };
            case "candidate_not_found":
                return { kind: "candidate_not_found", candidateId };
            case "accepted": {
                const tallies = await this.store.listCandidates(survey.id);
                const counted = tallies.find((c) => c.id === candidateId) ?? { ...candidate, votes: candidate.votes + 1 };
                logger.info("Vote accepted", { surveyId: survey.id, candidateId, userId });
                return { kind: "accepted", survey, candidate: counted, tallies };
            }
        }
    }

    async recheckMembership(surveyId: number, userId: number): Promise<MembershipOutcome> {
        const survey = await this.store.getSurvey(surveyId);
        if (!survey) return { kind: "survey_not_found", surveyId };
        if (!survey.active) return { kind: "survey_closed", surveyId };

        const channels = await this.store.listRequiredChannels(surveyId);
        const missing = await this.verifier.findMissing(userId, channels);
        if (missing.length > 0) return { kind: "still_missing", surveyId, missing };

        const candidates = await this.store.listCandidates(surveyId);
        return { kind: "cleared", details: { survey, candidates, channels } };
    }
}
