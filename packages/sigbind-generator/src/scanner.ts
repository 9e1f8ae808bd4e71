/**
 * AST Scanner: OXC-based signal and listener discovery.
 *
 * Parses TypeScript source files with OXC and extracts top-level
 * `defineSignal("id", [...])` declarations and
 * `declareListeners(Class).on(Kind, "method")` chains. Only literal ids and
 * method names are extracted; anything computed is skipped with a warning.
 */

import { readFileSync } from "node:fs";
import { parseSync } from "oxc-parser";
import { isReservedId } from "sigbind";
import type { ScannedListenerBinding, ScannedListenerClass, ScannedSignal, ScanResult } from "./types";

// ── File filtering ──────────────────────────────────────────────────

const EXCLUDE_PATTERNS = [/\.d\.ts$/, /\.test\.ts$/, /\.spec\.ts$/, /\.gen\.ts$/];

function shouldInclude(filePath: string): boolean {
    return filePath.endsWith(".ts") && !EXCLUDE_PATTERNS.some((p) => p.test(filePath));
}

// ── AST helpers ─────────────────────────────────────────────────────

type ASTNode = { type: string; [key: string]: unknown };

function isNode(value: unknown): value is ASTNode {
    return typeof value === "object" && value !== null && typeof Reflect.get(value, "type") === "string";
}

function child(node: ASTNode | null | undefined, key: string): ASTNode | null {
    const value = node?.[key];
    return isNode(value) ? value : null;
}

function children(node: ASTNode | null | undefined, key: string): (ASTNode | null)[] {
    const value = node?.[key];
    if (!Array.isArray(value)) return [];
    return value.map((el: unknown) => (isNode(el) ? el : null));
}

/** Extract a string literal value from an AST node. Returns null for non-literals. */
function getStringLiteral(node: ASTNode | null | undefined): string | null {
    const value = node?.value;
    if (node?.type === "Literal" && typeof value === "string") {
        return value;
    }
    return null;
}

function getIdentifierName(node: ASTNode | null | undefined): string | null {
    const name = node?.name;
    if (node?.type === "Identifier" && typeof name === "string") {
        return name;
    }
    return null;
}

/** Get a property value from an ObjectExpression by key name. */
function getObjectProperty(obj: ASTNode, key: string): ASTNode | null {
    for (const prop of children(obj, "properties")) {
        if (prop?.type !== "Property") continue;
        if (getIdentifierName(child(prop, "key")) === key) {
            return child(prop, "value");
        }
    }
    return null;
}

// ── Export detection ────────────────────────────────────────────────

/** Names exported through `export { x }` specifier lists. */
function extractExportedNames(body: ASTNode[]): Set<string> {
    const names = new Set<string>();
    for (const node of body) {
        if (node.type !== "ExportNamedDeclaration" || child(node, "declaration")) continue;
        if (child(node, "source")) continue;
        for (const spec of children(node, "specifiers")) {
            if (spec?.type !== "ExportSpecifier") continue;
            const local = getIdentifierName(child(spec, "local"));
            if (local) names.add(local);
        }
    }
    return names;
}

// ── Signal scanning ─────────────────────────────────────────────────

function countParams(paramsNode: ASTNode | null, id: string, filePath: string): number | null {
    if (!paramsNode) return 0;
    const elements = children(paramsNode, "elements");
    if (paramsNode.type !== "ArrayExpression" || elements.some((el) => el?.type === "SpreadElement")) {
        console.warn(`[scanner] defineSignal("${id}") has a non-literal parameter list in ${filePath}`);
        return null;
    }
    return elements.length;
}

function resolveBuiltin(optionsNode: ASTNode | null, id: string): boolean {
    const builtinNode = optionsNode?.type === "ObjectExpression" ? getObjectProperty(optionsNode, "builtin") : null;
    const value = builtinNode?.value;
    if (builtinNode?.type === "Literal" && typeof value === "boolean") {
        return value;
    }
    return isReservedId(id);
}

/** Extract a `const x = defineSignal(...)` declarator. */
function extractSignal(declarator: ASTNode, filePath: string, exported: boolean): ScannedSignal | null {
    const init = child(declarator, "init");
    if (init?.type !== "CallExpression") return null;
    if (getIdentifierName(child(init, "callee")) !== "defineSignal") return null;

    const [idNode, paramsNode, optionsNode] = children(init, "arguments");
    const id = getStringLiteral(idNode);
    if (!id) {
        console.warn(`[scanner] Skipping defineSignal() with non-literal id in ${filePath}`);
        return null;
    }

    const varName = getIdentifierName(child(declarator, "id"));
    if (!varName) {
        console.warn(`[scanner] Skipping defineSignal("${id}") not assigned to a plain variable in ${filePath}`);
        return null;
    }

    return {
        id,
        varName,
        filePath,
        exported,
        arity: countParams(paramsNode ?? null, id, filePath),
        builtin: resolveBuiltin(optionsNode ?? null, id),
    };
}

// ── Listener scanning ───────────────────────────────────────────────

/**
 * Unwind `declareListeners(Class).on(A, "x").once(B, "y")` from the outermost
 * call inwards. Returns null for any other expression.
 */
function extractListeners(expression: ASTNode | null, filePath: string): ScannedListenerClass | null {
    const bindings: ScannedListenerBinding[] = [];
    let node = expression;

    while (node?.type === "CallExpression") {
        const callee = child(node, "callee");
        const args = children(node, "arguments");

        if (getIdentifierName(callee) === "declareListeners") {
            const className = getIdentifierName(args[0]);
            if (!className) {
                console.warn(`[scanner] Skipping declareListeners() with a non-identifier class in ${filePath}`);
                return null;
            }
            return { className, filePath, bindings: bindings.reverse() };
        }

        if (callee?.type !== "MemberExpression" || callee.computed === true) return null;
        const call = getIdentifierName(child(callee, "property"));
        if (call !== "on" && call !== "once") return null;

        const signalVar = getIdentifierName(args[0]);
        const method = getStringLiteral(args[1]);
        if (signalVar && method) {
            bindings.push({ signalVar, method, cardinality: call === "on" ? "every" : "once" });
        } else {
            console.warn(`[scanner] Skipping .${call}() with non-literal arguments in ${filePath}`);
        }
        node = child(callee, "object");
    }

    return null;
}

// ── File scanning ───────────────────────────────────────────────────

function scanFile(filePath: string): ScanResult {
    const source = readFileSync(filePath, "utf-8");
    const result = parseSync(filePath, source, { sourceType: "module" });

    for (const err of result.errors) {
        console.warn(`[scanner] Parse error in ${filePath}: ${err.message}`);
    }

    const program: unknown = result.program;
    const body = isNode(program) ? children(program, "body").filter(isNode) : [];
    const exportedNames = extractExportedNames(body);
    const signals: ScannedSignal[] = [];
    const listeners: ScannedListenerClass[] = [];

    for (const statement of body) {
        if (statement.type === "ExpressionStatement") {
            const found = extractListeners(child(statement, "expression"), filePath);
            if (found) listeners.push(found);
            continue;
        }

        const exportedDeclaration = statement.type === "ExportNamedDeclaration";
        const declaration = exportedDeclaration ? child(statement, "declaration") : statement;
        if (declaration?.type !== "VariableDeclaration") continue;

        for (const declarator of children(declaration, "declarations")) {
            if (!declarator) continue;
            const varName = getIdentifierName(child(declarator, "id"));
            const exported = exportedDeclaration || (varName !== null && exportedNames.has(varName));
            const signal = extractSignal(declarator, filePath, exported);
            if (signal) signals.push(signal);
        }
    }

    return { signals, listeners };
}

// ── File discovery ──────────────────────────────────────────────────

async function discoverFiles(basePath: string): Promise<string[]> {
    const { globSync } = await import("tinyglobby");
    const paths = globSync(["**/*.ts"], { cwd: basePath, absolute: true, ignore: ["node_modules/**"] });
    return paths.filter(shouldInclude).sort();
}

// ── Main scan function ──────────────────────────────────────────────

/**
 * Scan TypeScript source files for signal kinds and listener declarations.
 *
 * @param basePath - Root directory to scan (e.g., `./src`)
 */
export async function scan(basePath: string): Promise<ScanResult> {
    const files = await discoverFiles(basePath);

    const signals: ScannedSignal[] = [];
    const listeners: ScannedListenerClass[] = [];
    for (const filePath of files) {
        const found = scanFile(filePath);
        signals.push(...found.signals);
        listeners.push(...found.listeners);
    }

    const signalVars = new Set(signals.map((s) => s.varName));
    for (const listener of listeners) {
        for (const binding of listener.bindings) {
            if (!signalVars.has(binding.signalVar)) {
                console.warn(
                    `[scanner] Listener class "${listener.className}" references unknown signal variable "${binding.signalVar}" in ${listener.filePath}`,
                );
            }
        }
    }

    return { signals, listeners };
}
