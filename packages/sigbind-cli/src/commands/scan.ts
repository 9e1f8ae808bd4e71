import { relative, resolve } from "node:path";
import { scan as scanSources } from "@sigbind/generator";

interface ScanOptions {
    src: string;
}

export async function scan(options: ScanOptions): Promise<void> {
    const srcDir = resolve(process.cwd(), options.src);
    console.log(`Scanning ${srcDir}...`);
    const { signals, listeners } = await scanSources(srcDir);

    console.log(`Found ${signals.length} signal(s)`);
    for (const signal of signals) {
        const flags = [signal.builtin ? "builtin" : null, signal.exported ? null : "not exported"].filter(Boolean);
        const arity = signal.arity === null ? "?" : String(signal.arity);
        const suffix = flags.length > 0 ? ` [${flags.join(", ")}]` : "";
        console.log(`  ${signal.id} (${arity}) ${signal.varName} in ${relative(srcDir, signal.filePath)}${suffix}`);
    }

    console.log(`Found ${listeners.length} listener class(es)`);
    for (const listener of listeners) {
        console.log(`  ${listener.className} in ${relative(srcDir, listener.filePath)}`);
        for (const binding of listener.bindings) {
            console.log(`    ${binding.cardinality === "once" ? "once" : "on"} ${binding.signalVar} -> ${binding.method}`);
        }
    }
}
