/**
 * Contract: CLI commands -- scan and generate against a source tree on disk.
 *
 * Sections:
 *   1. generate writes signals.gen.ts
 *   2. scan prints a summary
 */
import { mkdirSync, mkdtempSync, readFileSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { generate } from "./generate";
import { scan } from "./scan";

const SIGNALS = `
import { defineSignal, param } from "sigbind";
export const Ping = defineSignal("Ping");
export const Score = defineSignal("Score", [param.string(), param.integer()]);
const Ready = defineSignal("sigbind:ready");
`;

const PLAYER = `
import { declareListeners } from "sigbind";
import { Ping, Score } from "./signals";
export class Player {
    onPing() {}
    onScore(name, points) {}
}
declareListeners(Player).on(Ping, "onPing").once(Score, "onScore");
`;

describe("CLI commands", () => {
    let dir: string;

    beforeEach(() => {
        dir = mkdtempSync(join(tmpdir(), "sigbind-cli-"));
        mkdirSync(join(dir, "src"));
        writeFileSync(join(dir, "src", "signals.ts"), SIGNALS);
        writeFileSync(join(dir, "src", "player.ts"), PLAYER);
    });

    afterEach(() => {
        vi.restoreAllMocks();
        rmSync(dir, { recursive: true, force: true });
    });

    // -- 1. generate --
    describe("generate", () => {
        it("writes signals.gen.ts into the output directory", async () => {
            vi.spyOn(console, "log").mockImplementation(() => {});
            await generate({ src: join(dir, "src"), output: join(dir, ".sigbind") });

            const content = readFileSync(join(dir, ".sigbind", "signals.gen.ts"), "utf-8");
            expect(content).toContain('import { Ping, Score } from "../src/signals";');
            expect(content).toContain('import "../src/player";');
            expect(content).toContain("export const signals: SignalKindInstance[] = [Ping, Score];");
        });

        it("leaves an up-to-date file untouched", async () => {
            const log = vi.spyOn(console, "log").mockImplementation(() => {});
            const options = { src: join(dir, "src"), output: join(dir, ".sigbind") };
            await generate(options);
            log.mockClear();

            await generate(options);

            const lines = log.mock.calls.map((call) => String(call[0]));
            expect(lines.some((line) => line.endsWith("signals.gen.ts (unchanged)"))).toBe(true);
            expect(lines.at(-1)).toBe("Done.");
        });
    });

    // -- 2. scan --
    describe("scan", () => {
        it("prints signals and listener bindings", async () => {
            const log = vi.spyOn(console, "log").mockImplementation(() => {});
            await scan({ src: join(dir, "src") });

            const lines = log.mock.calls.map((call) => String(call[0]));
            expect(lines.slice(1)).toEqual([
                "Found 3 signal(s)",
                "  Ping (0) Ping in signals.ts",
                "  Score (2) Score in signals.ts",
                "  sigbind:ready (0) Ready in signals.ts [builtin, not exported]",
                "Found 1 listener class(es)",
                "  Player in player.ts",
                "    on Ping -> onPing",
                "    once Score -> onScore",
            ]);
        });
    });
});
