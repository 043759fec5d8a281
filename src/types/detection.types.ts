/** [x, y, width, height], top-left origin, tensor-space pixels. */
export type BoxXYWH = [x: number, y: number, width: number, height: number];

export type CornerBox = { x1: number; y1: number; x2: number; y2: number };

/** What a detection model hands back before adaptation. */
export type RawDetection = {
    box: CornerBox;
    confidence: number;        // 0..1
    classId: number;
};

export type Detection = {
    box: BoxXYWH;
    confidence: number;        // 0..1
    classId: number;
};

/** Who produced the result: a loaded model, or the statistics-based simulator. */
export type DetectionSource = 'detector' | 'simulated';

export type FindingResult = {
    found: true;
    confidence: number;        // 0..100, two decimals
    box: BoxXYWH;
    count: number;
    all: Detection[];
    source: DetectionSource;
};

export type EmptyResult = {
    found: false;
    confidence: 0;
    box: [];
    count: 0;
    all: [];
    source: DetectionSource;
    error?: string;
};

export type DetectionResult = FindingResult | EmptyResult;

export function emptyResult(source: DetectionSource, error?: string): EmptyResult {
    const result: EmptyResult = { found: false, confidence: 0, box: [], count: 0, all: [], source };
    if (error !== undefined) result.error = error;
    return result;
}
