import http from "http";
import WebSocket, { WebSocketServer } from "ws";
import { SurveyStore } from "./db";
import { logger } from "./logger";

export interface TallySnapshot {
    name: string;
    votes: number;
}

/** `survey_id` from a request URL such as `/ws?survey_id=3`, or null. */
export function parseSurveyIdParam(url: string | undefined): number | null {
    if (!url) return null;
    const raw = new URL(url, "http://localhost").searchParams.get("survey_id");
    if (!raw || !/^\d+$/.test(raw)) return null;
    const id = Number(raw);
    return Number.isSafeInteger(id) && id > 0 ? id : null;
}

export async function tallySnapshot(store: SurveyStore, surveyId: number): Promise<TallySnapshot[]> {
    const candidates = await store.listCandidates(surveyId);
    return candidates.map((c) => ({ name: c.name, votes: c.votes }));
}

/**
 * Read-only results feed: every connected socket receives the candidate
 * tallies of its survey right away and then every `intervalMs`.
 */
export function attachLiveResults(
    server: http.Server,
    store: SurveyStore,
    options: { intervalMs: number; path?: string },
): WebSocketServer {
    const wss = new WebSocketServer({ server, path: options.path ?? "/ws" });

    wss.on("connection", (socket: WebSocket, req: http.IncomingMessage) => {
        const surveyId = parseSurveyIdParam(req.url);
        if (surveyId === null) {
            socket.close(1008, "survey_id query parameter is required");
            return;
        }

        const push = async () => {
            try {
                const snapshot = await tallySnapshot(store, surveyId);
                if (socket.readyState === WebSocket.OPEN) socket.send(JSON.stringify(snapshot));
            } catch (err) {
                logger.error("Live results snapshot failed", { surveyId, error: err });
            }
        };

        const timer = setInterval(() => {
            push().catch((err) => logger.error("Live results push failed", err));
        }, options.intervalMs);
        socket.on("close", () => clearInterval(timer));
        socket.on("error", (err) => logger.warn("Live results socket error", { surveyId, error: err.message }));
        push().catch((err) => logger.error("Live results push failed", err));
    });

    return wss;
}

/** `wss.close()` leaves sockets on an external server open; end them first so their timers stop. */
export function closeLiveResults(wss: WebSocketServer): Promise<void> {
    for (const client of wss.clients) client.terminate();
    return new Promise((resolve, reject) => wss.close((err) => (err ? reject(err) : resolve())));
}
