import { describe, expect, it } from "vitest";
import { StoreError } from "../src/utils/errors";
import { interpretCastVote } from "../src/utils/supabaseStore";

describe("interpretCastVote", () => {
    it("passes through the function's outcomes", () => {
        expect(interpretCastVote("accepted", null)).toBe("accepted");
        expect(interpretCastVote("already_voted", null)).toBe("already_voted");
        expect(interpretCastVote("candidate_not_found", null)).toBe("candidate_not_found");
        expect(interpretCastVote("survey_closed", null)).toBe("survey_closed");
    });

    it("treats a unique violation as a duplicate vote", () => {
        expect(interpretCastVote(null, { code: "23505", message: "duplicate key value" })).toBe("already_voted");
    });

    it("raises retryable store errors for other failures", () => {
        let caught: unknown;
        try {
            interpretCastVote(null, { code: "08006", message: "connection failure" });
        } catch (err) {
            caught = err;
        }
        expect(caught).toBeInstanceOf(StoreError);
        expect(caught).toMatchObject({ message: "cast_vote failed: connection failure", retryable: true });
    });

    it("refuses unknown results", () => {
        expect(() => interpretCastVote("maybe", null)).toThrow("cast_vote returned unexpected value: maybe");
    });
});
