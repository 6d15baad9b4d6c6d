export interface Survey {
    id: number;
    title: string;
    description: string | null;
    image: string | null; // Telegram file_id of the cover photo
    active: boolean;
    createdAt: number;
}

export interface Candidate {
    id: number;
    surveyId: number;
    name: string;
    votes: number;
}

export type ChannelRef =
    | { kind: "handle"; handle: string } // always "@name"
    | { kind: "invite"; url: string }
    | { kind: "chatId"; chatId: number };

export interface RequiredChannel {
    id: number;
    surveyId: number;
    ref: ChannelRef;
}

export interface SurveyDetails {
    survey: Survey;
    candidates: Candidate[];
    channels: RequiredChannel[];
}

export interface RegisteredUser {
    id: number;
    username: string | null;
    fullName: string;
    firstSeenAt: number;
}

export interface WelcomeScreen {
    text: string;
    image: string | null;
}

export type VoteOutcome =
    | { kind: "accepted"; survey: Survey; candidate: Candidate; tallies: Candidate[] }
    | { kind: "candidate_not_found"; candidateId: number }
    | { kind: "survey_closed"; surveyId: number }
    | { kind: "already_voted"; surveyId: number }
    | { kind: "membership_required"; surveyId: number; candidateId: number; missing: RequiredChannel[] };

export type MembershipOutcome =
    | { kind: "cleared"; details: SurveyDetails }
    | { kind: "still_missing"; surveyId: number; missing: RequiredChannel[] }
    | { kind: "survey_not_found"; surveyId: number }
    | { kind: "survey_closed"; surveyId: number };

/** Result of the store's atomic accept path. */
export type CastVoteResult = "accepted" | "already_voted" | "candidate_not_found" | "survey_closed";

export interface DeliveryReport {
    sent: number;
    failed: number;
    failedRecipients: number[];
}

export type StopResult =
    | { kind: "stopped"; survey: Survey; candidates: Candidate[]; delivery: DeliveryReport }
    | { kind: "already_stopped"; survey: Survey }
    | { kind: "not_found"; surveyId: number };

export type DeleteResult =
    | { kind: "deleted"; survey: Survey }
    | { kind: "not_found"; surveyId: number };
