import { DeliveryReport } from "../types";
import { TransportError } from "./errors";
import { logger } from "./logger";

export type SendFn = (recipient: number) => Promise<unknown>;

export const sleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

/**
 * Sends to every recipient one after another, pausing `delayMs` between
 * sends to stay under Telegram's flood limits. A failed recipient is counted
 * and logged; the rest of the batch still goes out.
 */
export async function deliverAll(recipients: number[], send: SendFn, options: { delayMs: number }): Promise<DeliveryReport> {
    const report: DeliveryReport = { sent: 0, failed: 0, failedRecipients: [] };
    for (const [i, recipient] of recipients.entries()) {
        if (i > 0 && options.delayMs > 0) await sleep(options.delayMs);
        try {
            await send(recipient);
            report.sent += 1;
        } catch (err) {
            report.failed += 1;
            report.failedRecipients.push(recipient);
            const failure = new TransportError(recipient, { cause: err });
            logger.warn(failure.message, { error: err instanceof Error ? err.message : String(err) });
        }
    }
    return report;
}
