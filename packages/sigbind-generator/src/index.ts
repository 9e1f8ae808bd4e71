export type { GeneratorInput, GeneratorOutput } from "./generator";
export { generate } from "./generator";
export { scan } from "./scanner";
export type {
    GeneratedFile,
    ScannedListenerBinding,
    ScannedListenerClass,
    ScannedSignal,
    ScanResult,
} from "./types";
