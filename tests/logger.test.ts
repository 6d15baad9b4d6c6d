import { afterEach, describe, expect, it, vi } from "vitest";
import { logger, setLogLevel } from "../src/utils/logger";

describe("logger", () => {
    afterEach(() => {
        setLogLevel(null);
        vi.restoreAllMocks();
    });

    it("follows LOG_LEVEL until a level is configured", () => {
        const log = vi.spyOn(console, "log").mockImplementation(() => undefined);
        logger.info("hidden");
        expect(log).not.toHaveBeenCalled();

        setLogLevel("info");
        logger.debug("still hidden");
        logger.info("shown", { surveyId: 3 });
        expect(log).toHaveBeenCalledTimes(1);
        expect(log.mock.calls[0][0]).toMatch(/^\[\d{4}-\d\d-\d\dT[\d:.]+Z\] \[INFO\]$/);
        expect(log.mock.calls[0].slice(1)).toEqual(["shown", { surveyId: 3 }]);
    });

    it("writes warnings and errors to stderr", () => {
        const err = vi.spyOn(console, "error").mockImplementation(() => undefined);
        setLogLevel("warn");
        logger.info("hidden");
        logger.warn("careful");
        logger.error("broken");
        expect(err.mock.calls.map((call) => call[1])).toEqual(["careful", "broken"]);
    });
});
