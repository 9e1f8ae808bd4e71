/**
 * Contract: scan() -- static discovery of signal kinds and listener declarations.
 *
 * Sections:
 *   1. Signal declarations
 *   2. Listener declarations
 *   3. Skipped and excluded input
 */
import { mkdirSync, mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { dirname, join } from "node:path";
import { afterEach, describe, expect, it, vi } from "vitest";
import { scan } from "./scanner";

/** Create a temp dir with given files, run scan, clean up. */
async function scanFixture(files: Record<string, string>) {
    const dir = mkdtempSync(join(tmpdir(), "sigbind-scan-"));
    try {
        for (const [name, content] of Object.entries(files)) {
            const path = join(dir, name);
            mkdirSync(dirname(path), { recursive: true });
            writeFileSync(path, content);
        }
        return await scan(dir);
    } finally {
        rmSync(dir, { recursive: true, force: true });
    }
}

const GAME_FIXTURE = {
    "signals.ts": `
import { defineSignal, param } from "sigbind";
import { Vector } from "./vector";

export const Ping = defineSignal("Ping");
export const Move = defineSignal("Move", [param.instanceOf(Vector), param.number()]);
const Score = defineSignal("Score", [param.string()]);
const Ready = defineSignal("sigbind:ready");
const Quiet = defineSignal("Quiet", [], { builtin: true });

export { Score };
`,
    "entities/player.ts": `
import { declareListeners } from "sigbind";
import { Move, Ping } from "../signals";

export class Player {
    onPing() {}
    onMove(direction, speed) {}
}

declareListeners(Player).on(Ping, "onPing").once(Move, "onMove");
`,
};

describe("scan()", () => {
    afterEach(() => {
        vi.restoreAllMocks();
    });

    // -- 1. Signal declarations --
    describe("Signal declarations", () => {
        it("extracts id, variable, arity, export and builtin flags", async () => {
            const result = await scanFixture(GAME_FIXTURE);
            expect(result.signals.map(({ filePath: _, ...rest }) => rest)).toEqual([
                { id: "Ping", varName: "Ping", exported: true, arity: 0, builtin: false },
                { id: "Move", varName: "Move", exported: true, arity: 2, builtin: false },
                { id: "Score", varName: "Score", exported: true, arity: 1, builtin: false },
                { id: "sigbind:ready", varName: "Ready", exported: false, arity: 0, builtin: true },
                { id: "Quiet", varName: "Quiet", exported: false, arity: 0, builtin: true },
            ]);
        });

        it("records the absolute file path", async () => {
            const result = await scanFixture(GAME_FIXTURE);
            expect(result.signals[0]?.filePath).toMatch(/[\\/]signals\.ts$/);
        });

        it("reports a null arity for a non-literal parameter list", async () => {
            const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
            const result = await scanFixture({
                "signals.ts": `
const shared = [param.number()];
export const Spread = defineSignal("Spread", [...shared]);
export const Dynamic = defineSignal("Dynamic", shared);
`,
            });
            expect(result.signals.map((s) => s.arity)).toEqual([null, null]);
            expect(warn).toHaveBeenCalledTimes(2);
        });
    });

    // -- 2. Listener declarations --
    describe("Listener declarations", () => {
        it("extracts declareListeners() chains in declaration order", async () => {
            const result = await scanFixture(GAME_FIXTURE);
            expect(result.listeners).toHaveLength(1);
            expect(result.listeners[0]?.className).toBe("Player");
            expect(result.listeners[0]?.filePath).toMatch(/[\\/]entities[\\/]player\.ts$/);
            expect(result.listeners[0]?.bindings).toEqual([
                { signalVar: "Ping", method: "onPing", cardinality: "every" },
                { signalVar: "Move", method: "onMove", cardinality: "once" },
            ]);
        });

        it("accepts a declaration without bindings", async () => {
            const result = await scanFixture({ "empty.ts": "declareListeners(Empty);" });
            expect(result.listeners).toEqual([expect.objectContaining({ className: "Empty", bindings: [] })]);
        });

        it("warns about references to unknown signal variables", async () => {
            const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
            await scanFixture({ "orphan.ts": 'declareListeners(Orphan).on(Missing, "onMissing");' });
            expect(warn).toHaveBeenCalledOnce();
            expect(warn.mock.calls[0]?.[0]).toContain(
                'Listener class "Orphan" references unknown signal variable "Missing"',
            );
        });
    });

    // -- 3. Skipped and excluded input --
    describe("Skipped and excluded input", () => {
        it("skips defineSignal() with a non-literal id", async () => {
            const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
            const result = await scanFixture({ "signals.ts": "export const Named = defineSignal(name);" });
            expect(result.signals).toEqual([]);
            expect(warn.mock.calls[0]?.[0]).toContain("[scanner] Skipping defineSignal() with non-literal id");
        });

        it("skips .on() calls with a computed method name", async () => {
            const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
            const result = await scanFixture({
                "signals.ts": 'export const Ping = defineSignal("Ping");',
                "player.ts": 'declareListeners(Player).on(Ping, method).on(Ping, "onPing");',
            });
            expect(result.listeners[0]?.bindings).toEqual([
                { signalVar: "Ping", method: "onPing", cardinality: "every" },
            ]);
            expect(warn).toHaveBeenCalledOnce();
        });

        it("ignores spec, generated and declaration files", async () => {
            const result = await scanFixture({
                "signals.spec.ts": 'export const A = defineSignal("A");',
                "signals.gen.ts": 'export const B = defineSignal("B");',
                "signals.d.ts": 'export const C = defineSignal("C");',
            });
            expect(result.signals).toEqual([]);
        });

        it("ignores signals defined inside functions", async () => {
            const result = await scanFixture({
                "factory.ts": 'export function make() { return defineSignal("Inner"); }',
            });
            expect(result.signals).toEqual([]);
        });
    });
});
