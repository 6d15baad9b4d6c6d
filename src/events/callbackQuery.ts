import { Context, InputFile } from "grammy";
import { BotServices } from "../services";
import { ActionToken, parseAction } from "../utils/actions";
import { resultsCsv, resultsFilename } from "../utils/csv";
import { logger } from "../utils/logger";
import {
    adminSurveyKeyboard,
    alreadyStoppedText,
    adminSurveyText,
    candidatesKeyboard,
    deleteKeyboard,
    MEMBERSHIP_REQUIRED_TEXT,
    membershipKeyboard,
    stillMissingAlert,
    stillMissingText,
    stopSummaryText,
} from "../utils/messages";
import { alert, sendSurveyCard, toast } from "../utils/replies";

const ADMIN_VERBS: ReadonlySet<ActionToken["verb"]> = new Set(["admin_open", "stop", "delete", "export"]);

/** Button taps: `<verb>_<id>` tokens from inline keyboards. */
export async function handleCallbackQuery(ctx: Context, services: BotServices) {
    const data = ctx.callbackQuery?.data;
    const userId = ctx.from?.id;
    if (data === undefined || userId === undefined) return;

    const token = parseAction(data);
    if (!token) {
        logger.warn("Ignoring malformed callback data", { data, userId });
        await ctx.answerCallbackQuery();
        return;
    }
    if (ADMIN_VERBS.has(token.verb) && !services.isAdmin(userId)) {
        await alert(ctx, "Permission denied.");
        return;
    }

    switch (token.verb) {
        case "open":
            return openSurvey(ctx, services, token.id);
        case "vote":
            return vote(ctx, services, token.id, userId);
        case "recheck":
            return recheck(ctx, services, token.id, userId);
        case "admin_open":
            return adminOpen(ctx, services, token.id);
        case "stop":
            return stop(ctx, services, token.id);
        case "delete":
            return remove(ctx, services, token.id);
        case "export":
            return exportCsv(ctx, services, token.id);
    }
}

async function openSurvey(ctx: Context, { lifecycle }: BotServices, surveyId: number) {
    const details = await lifecycle.getDetails(surveyId);
    if (!details || !details.survey.active) {
        await alert(ctx, "Survey not found or already closed.");
        return;
    }
    await sendSurveyCard(ctx, details);
    await ctx.answerCallbackQuery();
}

async function vote(ctx: Context, { engine }: BotServices, candidateId: number, userId: number) {
    const outcome = await engine.attemptVote({ candidateId, userId });
    switch (outcome.kind) {
        case "candidate_not_found":
            await alert(ctx, "Candidate not found.");
            return;
        case "survey_closed":
            await alert(ctx, "This survey is closed.");
            return;
        case "already_voted":
            await alert(ctx, "❗ You have already voted in this survey!");
            return;
        case "membership_required":
            await ctx.reply(MEMBERSHIP_REQUIRED_TEXT, {
                reply_markup: membershipKeyboard(outcome.surveyId, outcome.missing),
            });
            await alert(ctx, "Join the required channels first.");
            return;
        case "accepted": {
            const reply_markup = candidatesKeyboard(outcome.tallies);
            try {
                await ctx.editMessageReplyMarkup({ reply_markup });
            } catch (err) {
                logger.debug("Could not refresh the vote keyboard in place", { error: err instanceof Error ? err.message : err });
                await ctx.reply("Updated results:", { reply_markup });
            }
            await toast(ctx, `✔ Your vote for ${outcome.candidate.name} is counted!`);
            return;
        }
    }
}

async function recheck(ctx: Context, { engine }: BotServices, surveyId: number, userId: number) {
    const outcome = await engine.recheckMembership(surveyId, userId);
    switch (outcome.kind) {
        case "survey_not_found":
            await alert(ctx, "Survey not found.");
            return;
        case "survey_closed":
            await alert(ctx, "This survey is closed.");
            return;
        case "still_missing":
            await ctx.reply(stillMissingText(outcome.missing), {
                reply_markup: membershipKeyboard(surveyId, outcome.missing),
            });
            await alert(ctx, stillMissingAlert(outcome.missing.length));
            return;
        case "cleared":
            await sendSurveyCard(ctx, outcome.details);
            await toast(ctx, "Membership confirmed. You can vote now.");
            return;
    }
}

async function adminOpen(ctx: Context, { lifecycle }: BotServices, surveyId: number) {
    const details = await lifecycle.getDetails(surveyId);
    if (!details) {
        await alert(ctx, "Survey not found.");
        return;
    }
    const voters = await lifecycle.countVoters(surveyId);
    await ctx.reply(adminSurveyText(details, voters), { reply_markup: adminSurveyKeyboard(details.survey) });
    await ctx.answerCallbackQuery();
}

async function stop(ctx: Context, { lifecycle, tasks }: BotServices, surveyId: number) {
    const survey = await lifecycle.getSurvey(surveyId);
    const chatId = ctx.chat?.id;
    if (!survey || chatId === undefined) {
        await alert(ctx, "Survey not found.");
        return;
    }
    if (!survey.active) {
        await ctx.reply(alreadyStoppedText(survey.title), { reply_markup: deleteKeyboard(surveyId) });
        await ctx.answerCallbackQuery();
        return;
    }

    await toast(ctx, "Closing the survey and notifying voters…");
    // the voter fan-out can take minutes; the admin gets the summary when it ends
    const api = ctx.api;
    tasks.run(`stop survey ${surveyId}`, async () => {
        const result = await lifecycle.stop(surveyId);
        switch (result.kind) {
            case "not_found":
                await api.sendMessage(chatId, "Survey not found.");
                return;
            case "already_stopped":
                await api.sendMessage(chatId, alreadyStoppedText(result.survey.title), {
                    reply_markup: deleteKeyboard(surveyId),
                });
                return;
            case "stopped":
                await api.sendMessage(
                    chatId,
                    stopSummaryText(result.survey.title, result.delivery.sent, result.delivery.failed),
                    { reply_markup: deleteKeyboard(surveyId) },
                );
                return;
        }
    });
}

async function remove(ctx: Context, { lifecycle }: BotServices, surveyId: number) {
    const result = await lifecycle.delete(surveyId);
    if (result.kind === "not_found") {
        await alert(ctx, "Survey not found or already deleted.");
        return;
    }
    await ctx.reply(`✅ Survey “${result.survey.title}” (ID: ${surveyId}) was deleted permanently.`);
    await ctx.answerCallbackQuery({ text: "Survey deleted." });
}

async function exportCsv(ctx: Context, { lifecycle }: BotServices, surveyId: number) {
    const details = await lifecycle.getDetails(surveyId);
    if (!details) {
        await alert(ctx, "Survey not found.");
        return;
    }
    const file = new InputFile(Buffer.from(resultsCsv(details.candidates), "utf8"), resultsFilename(surveyId));
    await ctx.replyWithDocument(file, { caption: `📤 ${details.survey.title}` });
    await ctx.answerCallbackQuery();
}
