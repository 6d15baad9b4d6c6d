import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { MEMBERSHIP_REQUIRED_TEXT } from "../src/utils/messages";
import { ADMIN_ID, BotHarness, callbackUpdate, startBot } from "./telegram";

const HANDLES = [
    "@survey_partner_channel_1",
    "@survey_partner_channel_2",
    "@survey_partner_channel_3",
    "@survey_partner_channel_4",
    "@survey_partner_channel_5",
    "@survey_partner_channel_6",
];

describe("callback query handling", () => {
    let h: BotHarness;

    beforeEach(async () => {
        h = await startBot();
    });

    afterEach(async () => {
        await h.services.tasks.drain();
        await h.telegram.close();
    });

    const answers = () => h.telegram.payloadsOf("answerCallbackQuery");

    it("keeps admin buttons from other users", async () => {
        const survey = await h.services.lifecycle.createDraftSurvey("T");
        for (const verb of ["admin_open", "stop", "delete", "export"]) {
            await h.send(callbackUpdate(50, `${verb}_${survey.id}`));
        }
        expect(answers()).toHaveLength(4);
        for (const answer of answers()) {
            expect(answer).toMatchObject({ text: "Permission denied.", show_alert: true });
        }
        expect((await h.store.getSurvey(survey.id))?.active).toBe(true);
        expect(h.telegram.payloadsOf("sendMessage")).toEqual([]);
    });

    it("acknowledges malformed buttons without a reply", async () => {
        await h.send(callbackUpdate(50, "vote_abc"));
        await h.send(callbackUpdate(50, "launch_1"));
        expect(answers()).toEqual([{ callback_query_id: expect.any(String) }, { callback_query_id: expect.any(String) }]);
        expect(h.telegram.payloadsOf("sendMessage")).toEqual([]);
    });

    it("closes a survey in the background and reports the deliveries", async () => {
        const survey = await h.services.lifecycle.createDraftSurvey("T");
        const a = await h.services.lifecycle.addCandidate(survey.id, "A");
        const b = await h.services.lifecycle.addCandidate(survey.id, "B");
        await h.services.engine.attemptVote({ candidateId: a.id, userId: 21 });
        await h.services.engine.attemptVote({ candidateId: b.id, userId: 22 });
        h.telegram.blockedChats.add(22);

        await h.send(callbackUpdate(ADMIN_ID, `stop_${survey.id}`));
        expect(answers()).toEqual([
            expect.objectContaining({ text: "Closing the survey and notifying voters…" }),
        ]);
        await h.services.tasks.drain();

        expect(h.telegram.textsSentTo(21)).toEqual(["🔔 Survey closed: T\n\nResults:\n- A: 1 vote\n- B: 1 vote"]);
        expect(h.telegram.textsSentTo(ADMIN_ID)).toEqual(["Survey “T” is closed.\nResults sent: 1; failed: 1."]);

        await h.send(callbackUpdate(ADMIN_ID, `stop_${survey.id}`));
        expect(h.telegram.textsSentTo(ADMIN_ID).at(-1)).toBe("Survey “T” is already closed.");
        expect(h.services.tasks.size).toBe(0);
    });

    it("asks for membership before counting a vote", async () => {
        const survey = await h.services.lifecycle.createDraftSurvey("T");
        const a = await h.services.lifecycle.addCandidate(survey.id, "A");
        await h.services.lifecycle.addRequiredChannel(survey.id, "@req1");

        await h.send(callbackUpdate(40, `vote_${a.id}`));

        expect(h.telegram.textsSentTo(40)).toEqual([MEMBERSHIP_REQUIRED_TEXT]);
        expect(answers()).toEqual([expect.objectContaining({ text: "Join the required channels first.", show_alert: true })]);
        expect(await h.store.hasVoted(survey.id, 40)).toBe(false);
    });

    it("keeps the recheck answer within Telegram's limit and lists the channels in a message", async () => {
        const survey = await h.services.lifecycle.createDraftSurvey("T");
        await h.services.lifecycle.addCandidate(survey.id, "A");
        for (const handle of HANDLES) await h.services.lifecycle.addRequiredChannel(survey.id, handle);

        await h.send(callbackUpdate(40, `recheck_${survey.id}`));

        expect(answers()).toEqual([
            expect.objectContaining({ text: "You still need to join 6 channels/groups.", show_alert: true }),
        ]);
        const [reply] = h.telegram.payloadsOf("sendMessage");
        expect(reply.text).toBe(
            ["You have not joined these channels/groups yet:", ...HANDLES.map((handle) => `- ${handle}`)].join("\n"),
        );
        expect(JSON.stringify(reply.reply_markup)).toContain(`"callback_data":"recheck_${survey.id}"`);
    });

    it("shows the survey again once every channel is joined", async () => {
        const survey = await h.services.lifecycle.createDraftSurvey("T");
        await h.services.lifecycle.addCandidate(survey.id, "A");
        await h.services.lifecycle.addRequiredChannel(survey.id, "@req1");
        h.telegram.members.set("@req1|40", "member");

        await h.send(callbackUpdate(40, `recheck_${survey.id}`));

        expect(h.telegram.textsSentTo(40)).toEqual(["🗳 T\n\nRequired channels/groups:\n- @req1"]);
        expect(answers()).toEqual([expect.objectContaining({ text: "Membership confirmed. You can vote now." })]);
    });

    it("shortens long vote confirmations", async () => {
        const survey = await h.services.lifecycle.createDraftSurvey("T");
        const long = await h.services.lifecycle.addCandidate(survey.id, "x".repeat(250));

        await h.send(callbackUpdate(40, `vote_${long.id}`));

        const [answer] = answers();
        expect(typeof answer.text === "string" ? Array.from(answer.text).length : 0).toBe(200);
        expect(String(answer.text).endsWith("…")).toBe(true);
        expect(await h.store.hasVoted(survey.id, 40)).toBe(true);
    });
});
