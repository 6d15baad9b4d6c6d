import { Context } from "grammy";
import { SurveyDetails } from "../types";
import { candidatesKeyboard, surveyCaption } from "./messages";

/** Survey card: photo with caption when the survey has an image, text otherwise. */
export async function sendSurveyCard(ctx: Context, details: SurveyDetails) {
    const caption = surveyCaption(details);
    const reply_markup = details.candidates.length ? candidatesKeyboard(details.candidates) : undefined;
    if (details.survey.image) {
        await ctx.replyWithPhoto(details.survey.image, { caption, reply_markup });
        return;
    }
    await ctx.reply(caption, { reply_markup });
}

/** Telegram rejects callback answers longer than this. */
export const CALLBACK_TEXT_LIMIT = 200;

export function clipCallbackText(text: string) {
    const chars = Array.from(text);
    return chars.length <= CALLBACK_TEXT_LIMIT ? text : chars.slice(0, CALLBACK_TEXT_LIMIT - 1).join("") + "…";
}

export async function alert(ctx: Context, text: string) {
    await ctx.answerCallbackQuery({ text: clipCallbackText(text), show_alert: true });
}

export async function toast(ctx: Context, text: string) {
    await ctx.answerCallbackQuery({ text: clipCallbackText(text) });
}

export const fullName = (user: { first_name: string; last_name?: string }) =>
    [user.first_name, user.last_name].filter(Boolean).join(" ");
