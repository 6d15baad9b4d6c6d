import { NotFoundError, UserInputError } from "./errors";
import { SurveyLifecycleManager } from "./lifecycle";
import { formatChannelRef } from "./channels";
import { FINISH_LABEL } from "./messages";

export type WizardState =
    | "CollectingTitle"
    | "CollectingDescription"
    | "CollectingImage"
    | "CollectingCandidates"
    | "CollectingChannels"
    | "Done";

export type WizardInput = { kind: "text"; text: string } | { kind: "photo"; fileId: string };

export type WizardReply =
    | { kind: "prompt"; state: WizardState }
    | { kind: "rejected"; state: WizardState; reason: string }
    | { kind: "aborted"; reason: string }
    | { kind: "candidate_added"; name: string }
    | { kind: "channel_added"; channel: string }
    | { kind: "completed"; surveyId: number; candidates: number; channels: number };

export const isFinishInput = (input: WizardInput) =>
    input.kind === "text" && (input.text.trim() === FINISH_LABEL || input.text.trim().toLowerCase() === "/done");

/**
 * The admin's survey-creation dialogue, one instance per admin. Each input
 * either advances the state or is rejected with a reason; every accepted
 * field is written through the lifecycle manager straight away.
 */
export class SurveyDraftWizard {
    state: WizardState = "CollectingTitle";
    surveyId: number | null = null;
    private candidates = 0;
    private channels = 0;

    constructor(private readonly lifecycle: SurveyLifecycleManager) {}

    get inProgress() {
        return this.state !== "Done";
    }

    async handle(input: WizardInput): Promise<WizardReply> {
        try {
            return await this.step(input);
        } catch (err) {
            if (err instanceof UserInputError) return { kind: "rejected", state: this.state, reason: err.message };
            if (err instanceof NotFoundError) {
                // the draft was deleted from the survey list mid-dialogue
                this.state = "Done";
                return { kind: "aborted", reason: "❌ This survey no longer exists. Start again with /newsurvey." };
            }
            throw err;
        }
    }

    private async step(input: WizardInput): Promise<WizardReply> {
        const finish = isFinishInput(input);
        switch (this.state) {
            case "CollectingTitle": {
                if (input.kind !== "text" || finish) return this.reject("Send the survey title as text.");
                const survey = await this.lifecycle.createDraftSurvey(input.text);
                this.surveyId = survey.id;
                return this.advance("CollectingDescription");
            }
            case "CollectingDescription": {
                if (finish) return this.advance("CollectingImage");
                if (input.kind !== "text") return this.reject("Send the description as text, or press Finish to skip.");
                await this.lifecycle.setDescription(this.requireSurveyId(), input.text);
                return this.advance("CollectingImage");
            }
            case "CollectingImage": {
                if (finish) return this.advance("CollectingCandidates");
                if (input.kind !== "photo") return this.reject("Send a photo, or press Finish to skip.");
                await this.lifecycle.setImage(this.requireSurveyId(), input.fileId);
                return this.advance("CollectingCandidates");
            }
            case "CollectingCandidates": {
                if (finish) return this.advance("CollectingChannels");
                if (input.kind !== "text") return this.reject("Send the candidate name as text.");
                const candidate = await this.lifecycle.addCandidate(this.requireSurveyId(), input.text);
                this.candidates += 1;
                return { kind: "candidate_added", name: candidate.name };
            }
            case "CollectingChannels": {
                if (finish) {
                    this.state = "Done";
                    return {
                        kind: "completed",
                        surveyId: this.requireSurveyId(),
                        candidates: this.candidates,
                        channels: this.channels,
                    };
                }
                if (input.kind !== "text") return this.reject("Send @channel, a t.me link or a numeric chat id.");
                const channel = await this.lifecycle.addRequiredChannel(this.requireSurveyId(), input.text);
                this.channels += 1;
                return { kind: "channel_added", channel: formatChannelRef(channel.ref) };
            }
            case "Done":
                return this.reject("This survey is already finished.");
        }
    }

    private advance(state: WizardState): WizardReply {
        this.state = state;
        return { kind: "prompt", state };
    }

    private reject(reason: string): WizardReply {
        return { kind: "rejected", state: this.state, reason };
    }

    private requireSurveyId(): number {
        if (this.surveyId === null) throw new Error(`Wizard in ${this.state} without a survey`);
        return this.surveyId;
    }
}

export type AdminSession =
    | { mode: "survey"; wizard: SurveyDraftWizard }
    | { mode: "welcome" }
    | { mode: "broadcast" };

/** Pending admin dialogues, keyed by admin user id. Lives only in memory. */
export class AdminSessionRegistry {
    private readonly sessions = new Map<number, AdminSession>();

    get(adminId: number): AdminSession | undefined {
        return this.sessions.get(adminId);
    }

    set(adminId: number, session: AdminSession) {
        this.sessions.set(adminId, session);
    }

    clear(adminId: number): AdminSession | undefined {
        const session = this.sessions.get(adminId);
        this.sessions.delete(adminId);
        return session;
    }
}
