import { mkdir, readFile, writeFile } from "node:fs/promises";
import { dirname, relative, resolve } from "node:path";
import { generate as generateFiles, scan } from "@sigbind/generator";

interface GenerateOptions {
    src: string;
    output: string;
}

export async function generate(options: GenerateOptions): Promise<void> {
    const srcDir = resolve(process.cwd(), options.src);
    const outputDir = resolve(process.cwd(), options.output);

    // 1. Scan source files
    console.log(`Scanning ${srcDir}...`);
    const scanResult = await scan(srcDir);
    console.log(
        `Found ${scanResult.signals.length} signal(s) and ${scanResult.listeners.length} listener class(es)`,
    );

    // 2. Generate output files
    const { files } = generateFiles({ scanResult, outputDir });

    // 3. Write to disk
    for (const file of files) {
        const fullPath = resolve(outputDir, file.path);
        await mkdir(dirname(fullPath), { recursive: true });
        const written = await writeFileIfChanged(fullPath, file.content);
        console.log(`  ${relative(process.cwd(), fullPath)}${written ? "" : " (unchanged)"}`);
    }

    console.log("Done.");
}

function isMissingFile(error: unknown): boolean {
    return error instanceof Error && Reflect.get(error, "code") === "ENOENT";
}

async function writeFileIfChanged(filePath: string, content: string): Promise<boolean> {
    const previous = await readFile(filePath, "utf-8").catch((error: unknown) => {
        if (isMissingFile(error)) return null;
        throw error;
    });
    if (previous === content) return false;

    await writeFile(filePath, content);
    return true;
}
