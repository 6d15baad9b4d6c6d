import { InlineKeyboard, Keyboard } from "grammy";
import { Candidate, DeliveryReport, RequiredChannel, Survey, SurveyDetails } from "../types";
import { encodeAction, SurveyListVerb } from "./actions";
import { formatChannelRef, joinLabel, joinUrl } from "./channels";
import type { WizardReply, WizardState } from "./wizard";

export const FINISH_LABEL = "✅ Finish";

export const ADMIN_LABELS = {
    create: "➕ Create survey",
    surveys: "📋 Surveys",
    results: "📊 Results",
    export: "📤 CSV export",
    broadcast: "📢 Broadcast",
    welcome: "🖼 Welcome screen",
    stats: "👥 Users",
} as const;

export const DEFAULT_WELCOME = "👋 Welcome! Pick a survey below to cast your vote.";

export function votesLabel(count: number) {
    return `${count} ${count === 1 ? "vote" : "votes"}`;
}

export function adminKeyboard() {
    return new Keyboard()
        .text(ADMIN_LABELS.create)
        .row()
        .text(ADMIN_LABELS.surveys)
        .text(ADMIN_LABELS.results)
        .row()
        .text(ADMIN_LABELS.export)
        .text(ADMIN_LABELS.broadcast)
        .row()
        .text(ADMIN_LABELS.welcome)
        .text(ADMIN_LABELS.stats)
        .resized();
}

export function finishKeyboard() {
    return new Keyboard().text(FINISH_LABEL).resized();
}

export function candidatesKeyboard(candidates: Candidate[]) {
    const kb = new InlineKeyboard();
    for (const c of candidates) {
        kb.text(`✨ ${c.name} — ${votesLabel(c.votes)}`, encodeAction("vote", c.id)).row();
    }
    return kb;
}

export function surveyListKeyboard(surveys: Survey[], verb: SurveyListVerb) {
    const kb = new InlineKeyboard();
    for (const s of surveys) {
        const label = verb === "open" ? s.title : `${s.id}: ${s.title}${s.active ? "" : " (stopped)"}`;
        kb.text(label, encodeAction(verb, s.id)).row();
    }
    return kb;
}

export function surveyCaption({ survey, candidates, channels }: SurveyDetails) {
    const lines = [`🗳 ${survey.title}`];
    if (survey.description) lines.push("", survey.description);
    if (!candidates.length) lines.push("", "No candidates yet.");
    if (channels.length) {
        lines.push("", "Required channels/groups:", ...channels.map((c) => `- ${formatChannelRef(c.ref)}`));
    }
    return lines.join("\n");
}

export function membershipKeyboard(surveyId: number, missing: RequiredChannel[]) {
    const kb = new InlineKeyboard();
    for (const c of missing) kb.url(joinLabel(c.ref), joinUrl(c.ref)).row();
    return kb.text("🔄 Check again", encodeAction("recheck", surveyId));
}

export const MEMBERSHIP_REQUIRED_TEXT =
    "To vote you must join the channels/groups below. Join them, then press “Check again”.";

export function stillMissingText(missing: RequiredChannel[]) {
    return ["You have not joined these channels/groups yet:", ...missing.map((c) => `- ${formatChannelRef(c.ref)}`)].join(
        "\n",
    );
}

export function stillMissingAlert(count: number) {
    return `You still need to join ${count} ${count === 1 ? "channel/group" : "channels/groups"}.`;
}

export function adminSurveyText({ survey, candidates, channels }: SurveyDetails, voters: number) {
    const lines = [
        `🗳 Survey: ${survey.title}`,
        `ID: ${survey.id} • ${survey.active ? "active" : "stopped"} • voters: ${voters}`,
        "",
        "Candidates:",
        ...(candidates.length ? candidates.map((c) => `- ${c.name}: ${votesLabel(c.votes)}`) : ["(none)"]),
    ];
    if (channels.length) lines.push("", "Required channels:", ...channels.map((c) => `- ${formatChannelRef(c.ref)}`));
    return lines.join("\n");
}

export function adminSurveyKeyboard(survey: Survey) {
    const kb = new InlineKeyboard();
    if (survey.active) kb.text("⏹ Stop survey", encodeAction("stop", survey.id));
    else kb.text("🗑 Delete survey permanently", encodeAction("delete", survey.id));
    return kb.row().text("📤 Export CSV", encodeAction("export", survey.id));
}

export function deleteKeyboard(surveyId: number) {
    return new InlineKeyboard().text("🗑 Delete survey permanently", encodeAction("delete", surveyId));
}

/** Message delivered to every voter when a survey is stopped. */
export function finalResultsText(survey: Survey, candidates: Candidate[]) {
    return [`🔔 Survey closed: ${survey.title}`, "", "Results:", ...candidates.map((c) => `- ${c.name}: ${votesLabel(c.votes)}`)].join(
        "\n",
    );
}

export function resultsText(survey: Survey, candidates: Candidate[]) {
    const total = candidates.reduce((sum, c) => sum + c.votes, 0);
    const lines = [`🗳 ${survey.title}`, `Total votes: ${total}`];
    if (candidates.length) lines.push(makeBar(candidates.map((c) => ({ label: c.name, count: c.votes })), total));
    return lines.join("\n");
}

export function makeBar(rows: { label: string; count: number }[], total: number) {
    const maxLabel = Math.max(...rows.map((r) => r.label.length), 4);
    return rows
        .map(({ label, count }) => {
            const pct = total === 0 ? 0 : count / total;
            const barLen = Math.round(pct * 10);
            const bar = "█".repeat(barLen) + "░".repeat(10 - barLen);
            const pctStr = `${Math.round(pct * 100)}%`.padStart(4, " ");
            return `${label.padEnd(maxLabel)} ${bar} ${count} (${pctStr})`;
        })
        .join("\n");
}

export function broadcastReportText({ sent, failed }: DeliveryReport) {
    return `📢 Broadcast finished.\nDelivered: ${sent}; failed: ${failed}.`;
}

export const alreadyStoppedText = (title: string) => `Survey “${title}” is already closed.`;

export function stopSummaryText(title: string, sent: number, failed: number) {
    return `Survey “${title}” is closed.\nResults sent: ${sent}; failed: ${failed}.`;
}

const WIZARD_PROMPTS: Record<WizardState, string> = {
    CollectingTitle: "📝 Send the survey title:",
    CollectingDescription: "🗒 Send a description, or press Finish to skip:",
    CollectingImage: "📷 Send a cover photo, or press Finish to skip:",
    CollectingCandidates: "✍ Send candidate names one per message. Press Finish when done:",
    CollectingChannels: "📢 Send required channels/groups one per message (@channel, https://t.me/channel or -100id). Press Finish when done:",
    Done: "✅ Survey is ready!",
};

export function wizardPrompt(state: WizardState) {
    return WIZARD_PROMPTS[state];
}

export function wizardReplyText(reply: WizardReply) {
    switch (reply.kind) {
        case "prompt":
            return wizardPrompt(reply.state);
        case "rejected":
        case "aborted":
            return reply.reason;
        case "candidate_added":
            return `✅ Candidate added: ${reply.name}`;
        case "channel_added":
            return `✅ Channel added: ${reply.channel}`;
        case "completed":
            return `✅ Survey is ready! ID: ${reply.surveyId}, candidates: ${reply.candidates}, required channels: ${reply.channels}.`;
    }
}
