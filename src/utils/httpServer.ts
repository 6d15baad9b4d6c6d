import http from "http";

export interface HealthStatus {
    ready: boolean;
    shuttingDown: boolean;
    botUser: string | null;
}

// Small HTTP health + readiness server so hosts that expect a bound port succeed.
// The live results WebSocket is attached to the same server.
export function createHttpServer(status: () => HealthStatus): http.Server {
    return http.createServer((req, res) => {
        const current = status();

        // readiness: 200 only while the bot is polling and not shutting down
        if (req.url === "/healthz") {
            const ready = current.ready && !current.shuttingDown;
            res.writeHead(ready ? 200 : 503, { "Content-Type": "application/json" });
            res.end(
                JSON.stringify({
                    status: ready ? "ok" : "starting",
                    uptime: process.uptime(),
                    ts: new Date().toISOString(),
                    botUser: current.botUser,
                }) + "\n",
            );
            return;
        }

        if (req.url === "/" || req.url === "/health") {
            res.writeHead(200, { "Content-Type": "text/plain" });
            res.end(current.shuttingDown ? "Shutting down\n" : "OK\n");
            return;
        }

        res.writeHead(404, { "Content-Type": "text/plain" });
        res.end("Not found\n");
    });
}
