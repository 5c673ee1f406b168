import {Detection, SymbolSummary, SYMBOL_TYPES} from "../types/detection.types";
import {SYMBOL_STYLES} from "../utils/draw-detections";

export function summarizeDetections(detections: Detection[]): SymbolSummary {
    const counts: SymbolSummary['counts'] = { notehead: 0, sharp: 0, flat: 0, natural: 0 };
    for (const det of detections) counts[det.symbolType]++;
    return { total: detections.length, counts };
}

/** One line per symbol type that was found, e.g. `notehead (o): 12 [#FF00FF]`. */
export function formatSummary(summary: SymbolSummary): string[] {
    return SYMBOL_TYPES
        .filter((t) => summary.counts[t] > 0)
        .sort()
        .map((t) => `${t} (${SYMBOL_STYLES[t].label}): ${summary.counts[t]} [${SYMBOL_STYLES[t].color}]`);
}
