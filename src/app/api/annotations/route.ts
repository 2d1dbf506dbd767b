import { NextRequest, NextResponse } from "next/server";
import { ZodError } from "zod";
import { loadConfig } from "@/lib/config";
import { errorResponse } from "@/lib/http";
import { annotationRequestSchema } from "@/lib/schemas";
import {
    appendAnnotation,
    buildSentenceAnnotation,
    loadTextEntries,
    splitSentences,
    RATING_DIMENSIONS,
    type TextEntry,
} from "@/lib/sentences";

/**
 * GET /api/annotations
 * Returns the texts to annotate, split into sentences.
 */
export async function GET() {
    const config = loadConfig();
    let entries: TextEntry[];
    try {
        entries = loadTextEntries(config.textsPath);
    } catch (err) {
        return errorResponse(err);
    }

    const texts = entries.map((t) => ({
        id: t.id,
        text: t.text,
        sentences: splitSentences(t.text),
    }));

    return NextResponse.json({
        texts,
        categories: config.categories,
        dimensions: RATING_DIMENSIONS,
    });
}

/**
 * POST /api/annotations
 * Appends one sentence-level annotation to the annotations file.
 * Body: { text_id, ratings: [{ novelty, feasibility, relevance, interest }], feedback? }
 */
export async function POST(request: NextRequest) {
    let body: unknown;
    try {
        body = await request.json();
    } catch {
        return NextResponse.json(
            { error: "Invalid JSON body" },
            { status: 400 }
        );
    }

    const parsed = annotationRequestSchema.safeParse(body);
    if (!parsed.success) {
        return NextResponse.json(
            { error: "text_id and ratings are required", issues: parsed.error.issues },
            { status: 400 }
        );
    }

    const config = loadConfig();
    let entries: TextEntry[];
    try {
        entries = loadTextEntries(config.textsPath);
    } catch (err) {
        return errorResponse(err);
    }

    const entry = entries.find((t) => t.id === parsed.data.text_id);
    if (!entry) {
        return NextResponse.json(
            { error: "Text not found" },
            { status: 404 }
        );
    }

    let total: number;
    try {
        const record = buildSentenceAnnotation(
            entry,
            parsed.data.ratings,
            parsed.data.feedback,
            config.categories
        );
        total = appendAnnotation(config.annotationsPath, record);
    } catch (err) {
        if (err instanceof ZodError) {
            return NextResponse.json(
                { error: "Ratings must be integers from 1 to 5", issues: err.issues },
                { status: 400 }
            );
        }
        return errorResponse(err);
    }

    return NextResponse.json({ success: true, total_annotations: total });
}
