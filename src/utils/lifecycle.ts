import { DeleteResult, RequiredChannel, StopResult, Survey, SurveyDetails } from "../types";
import { deliverAll, SendFn } from "./broadcast";
import { parseChannelRef } from "./channels";
import { SurveyStore } from "./db";
import { NotFoundError, UserInputError } from "./errors";
import { logger } from "./logger";
import { finalResultsText } from "./messages";

export type Notifier = (userId: number, text: string) => Promise<unknown>;

export interface LifecycleOptions {
    notify: Notifier;
    /** Pause between stop notifications. */
    delayMs: number;
}

/**
 * Draft → Active → Stopped → Deleted.
 *
 * A survey row is active from the moment its title is saved; the guided
 * dialogue appends description, image, candidates and channels to it.
 */
export class SurveyLifecycleManager {
    constructor(
        private readonly store: SurveyStore,
        private readonly options: LifecycleOptions,
    ) {}

    async createDraftSurvey(title: string): Promise<Survey> {
        const clean = title.trim();
        if (!clean) throw new UserInputError("Survey title must not be empty.");
        const survey = await this.store.createSurvey(clean);
        logger.info("Survey created", { surveyId: survey.id, title: clean });
        return survey;
    }

    async setDescription(surveyId: number, description: string | null): Promise<Survey> {
        const clean = description?.trim() || null;
        const survey = await this.store.updateSurvey(surveyId, { description: clean });
        if (!survey) throw new NotFoundError("survey", surveyId);
        return survey;
    }

    async setImage(surveyId: number, image: string | null): Promise<Survey> {
        const survey = await this.store.updateSurvey(surveyId, { image });
        if (!survey) throw new NotFoundError("survey", surveyId);
        return survey;
    }

    async addCandidate(surveyId: number, name: string) {
        const clean = name.trim();
        if (!clean) throw new UserInputError("Candidate name must not be empty.");
        await this.requireSurvey(surveyId);
        return this.store.addCandidate(surveyId, clean);
    }

    async addRequiredChannel(surveyId: number, channel: string): Promise<RequiredChannel> {
        const ref = parseChannelRef(channel);
        await this.requireSurvey(surveyId);
        return this.store.addRequiredChannel(surveyId, ref);
    }

    listActiveSurveys(): Promise<Survey[]> {
        return this.store.listSurveys({ activeOnly: true });
    }

    listSurveys(): Promise<Survey[]> {
        return this.store.listSurveys();
    }

    getSurvey(surveyId: number): Promise<Survey | null> {
        return this.store.getSurvey(surveyId);
    }

    async getDetails(surveyId: number): Promise<SurveyDetails | null> {
        const survey = await this.store.getSurvey(surveyId);
        if (!survey) return null;
        const [candidates, channels] = await Promise.all([
            this.store.listCandidates(surveyId),
            this.store.listRequiredChannels(surveyId),
        ]);
        return { survey, candidates, channels };
    }

    async countVoters(surveyId: number): Promise<number> {
        return (await this.store.listVoters(surveyId)).length;
    }

    /** Deactivates the survey and sends the final tallies to everyone who voted in it. */
    async stop(surveyId: number): Promise<StopResult> {
        const survey = await this.store.getSurvey(surveyId);
        if (!survey) return { kind: "not_found", surveyId };
        if (!survey.active) return { kind: "already_stopped", survey };

        await this.store.setSurveyActive(surveyId, false);
        const stopped: Survey = { ...survey, active: false };
        const [candidates, voters] = await Promise.all([
            this.store.listCandidates(surveyId),
            this.store.listVoters(surveyId),
        ]);

        const text = finalResultsText(stopped, candidates);
        const send: SendFn = (userId) => this.options.notify(userId, text);
        const delivery = await deliverAll(voters, send, { delayMs: this.options.delayMs });
        logger.info("Survey stopped", { surveyId, sent: delivery.sent, failed: delivery.failed });
        return { kind: "stopped", survey: stopped, candidates, delivery };
    }

    async delete(surveyId: number): Promise<DeleteResult> {
        const survey = await this.store.getSurvey(surveyId);
        if (!survey) return { kind: "not_found", surveyId };
        const deleted = await this.store.deleteSurvey(surveyId);
        if (!deleted) return { kind: "not_found", surveyId };
        logger.info("Survey deleted", { surveyId });
        return { kind: "deleted", survey };
    }

    /** Drops a survey whose creation dialogue was cancelled. */
    async discardDraft(surveyId: number): Promise<void> {
        await this.store.deleteSurvey(surveyId);
        logger.info("Draft survey discarded", { surveyId });
    }

    private async requireSurvey(surveyId: number): Promise<Survey> {
        const survey = await this.store.getSurvey(surveyId);
        if (!survey) throw new NotFoundError("survey", surveyId);
        return survey;
    }
}
