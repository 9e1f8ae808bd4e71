import { relative, sep } from "node:path";
import { groupBy } from "es-toolkit";
import type { GeneratedFile, ScannedSignal, ScanResult } from "./types";

export interface GeneratorInput {
    scanResult: ScanResult;
    /** Absolute directory the generated files will be written to. */
    outputDir: string;
}

export interface GeneratorOutput {
    files: GeneratedFile[];
}

const HEADER = "// Auto-generated by sigbind. Do not edit.";

/** Relative, extensionless, posix-style import specifier from `outputDir` to `filePath`. */
function importPath(outputDir: string, filePath: string): string {
    const rel = relative(outputDir, filePath).split(sep).join("/").replace(/\.ts$/, "");
    return rel.startsWith(".") ? rel : `./${rel}`;
}

function assertUniqueIds(signals: ScannedSignal[]): void {
    const byId = groupBy(signals, (s) => s.id);
    for (const [id, group] of Object.entries(byId)) {
        if (group.length > 1) {
            const locations = group.map((s) => `${s.varName} (${s.filePath})`).join(", ");
            throw new Error(`Duplicate signal id "${id}" declared by ${locations}`);
        }
    }
}

/**
 * Generate `signals.gen.ts`: a `signals` array of every exported, non-builtin
 * signal kind, plus side-effect imports of the files that declare listeners.
 * The array is meant for a MANUAL registry.
 */
export function generate(input: GeneratorInput): GeneratorOutput {
    const { scanResult, outputDir } = input;
    const signals = scanResult.signals.filter((s) => !s.builtin);
    assertUniqueIds(signals);

    const importable = signals.filter((s) => {
        if (!s.exported) {
            console.warn(`[generator] Signal "${s.id}" (${s.varName}) is not exported from ${s.filePath}; skipping`);
        }
        return s.exported;
    });

    const usedNames = new Set<string>();
    const localNames = new Map<ScannedSignal, string>();
    for (const signal of importable) {
        let local = signal.varName;
        for (let n = 2; usedNames.has(local); n++) {
            local = `${signal.varName}_${n}`;
        }
        usedNames.add(local);
        localNames.set(signal, local);
    }

    const lines: string[] = [HEADER, 'import type { SignalKindInstance } from "sigbind";'];

    const byFile = groupBy(importable, (s) => s.filePath);
    for (const filePath of Object.keys(byFile).sort()) {
        const specifiers = (byFile[filePath] ?? []).map((s) => {
            const local = localNames.get(s) ?? s.varName;
            return local === s.varName ? local : `${s.varName} as ${local}`;
        });
        lines.push(`import { ${specifiers.join(", ")} } from "${importPath(outputDir, filePath)}";`);
    }

    const listenerFiles = [...new Set(scanResult.listeners.map((l) => l.filePath))]
        .filter((filePath) => !(filePath in byFile))
        .sort();
    for (const filePath of listenerFiles) {
        lines.push(`import "${importPath(outputDir, filePath)}";`);
    }

    const entries = importable.map((s) => localNames.get(s) ?? s.varName);
    lines.push("", `export const signals: SignalKindInstance[] = [${entries.join(", ")}];`, "");

    return { files: [{ path: "signals.gen.ts", content: lines.join("\n") }] };
}
