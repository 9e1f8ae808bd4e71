/**
 * Codegen scan result types.
 *
 * These are the shapes the AST scanner produces and the generator consumes.
 */

export interface ScannedSignal {
    id: string;
    varName: string;
    filePath: string;
    exported: boolean;
    /** Number of declared parameters; null when the list is not an array literal. */
    arity: number | null;
    builtin: boolean;
}

export interface ScannedListenerBinding {
    /** Variable the signal kind is referenced through. */
    signalVar: string;
    method: string;
    cardinality: "every" | "once";
}

export interface ScannedListenerClass {
    className: string;
    filePath: string;
    bindings: ScannedListenerBinding[];
}

export interface ScanResult {
    signals: ScannedSignal[];
    listeners: ScannedListenerClass[];
}

export interface GeneratedFile {
    path: string; // relative to outputDir
    content: string;
}
