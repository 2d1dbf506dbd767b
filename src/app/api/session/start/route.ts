import { NextRequest, NextResponse } from "next/server";
import fs from "fs";
import path from "path";
import { loadConfig } from "@/lib/config";
import { readJsonFile, readTextFile } from "@/lib/files";
import { errorResponse } from "@/lib/http";
import { startRequestSchema } from "@/lib/schemas";
import {
    createPairwiseSession,
    createScoringSession,
    viewSession,
    type SessionOptions,
    type SessionState,
} from "@/lib/session";
import { saveSession } from "@/lib/sessionStore";

/**
 * POST /api/session/start
 * Creates a session from an inline item list or from the configured files.
 * Body: { mode: "score", input?, hide_completed?, seed? } | { mode: "choice", hide_completed? }
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

    const parsed = startRequestSchema.safeParse(body);
    if (!parsed.success) {
        return NextResponse.json(
            { error: "mode must be \"score\" or \"choice\"", issues: parsed.error.issues },
            { status: 400 }
        );
    }

    const config = loadConfig();
    const options: SessionOptions = {
        hideCompleted: parsed.data.hide_completed ?? false,
        seed: parsed.data.mode === "score" ? parsed.data.seed : undefined,
    };

    let state: SessionState;
    try {
        if (parsed.data.mode === "score") {
            const input = parsed.data.input ?? readJsonFile(config.itemsPath);
            state = createScoringSession(input, options);
        } else {
            const progressText =
                config.progressPath && fs.existsSync(config.progressPath)
                    ? readTextFile(config.progressPath)
                    : undefined;
            state = createPairwiseSession(
                {
                    promptsText: readTextFile(config.promptsPath),
                    comparisonsText: readTextFile(config.comparisonsPath),
                    comparisonsName: path.basename(config.comparisonsPath),
                    progressText,
                },
                options
            );
        }
    } catch (err) {
        return errorResponse(err);
    }

    saveSession(state);
    console.log(
        `[session] started ${state.id} (${state.scale}, ${state.ids.length} items)`
    );

    return NextResponse.json({
        session_id: state.id,
        view: viewSession(state),
    });
}
