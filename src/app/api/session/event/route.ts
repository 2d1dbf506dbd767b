import { NextRequest, NextResponse } from "next/server";
import { loadConfig } from "@/lib/config";
import { errorResponse } from "@/lib/http";
import { eventRequestSchema } from "@/lib/schemas";
import { handleEvent, viewSession, type SessionState } from "@/lib/session";
import { autosave, loadSession, saveSession } from "@/lib/sessionStore";

/**
 * POST /api/session/event
 * Applies one operator action to a stored session.
 * Body: { session_id, event: { type, ... } }
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

    const parsed = eventRequestSchema.safeParse(body);
    if (!parsed.success) {
        return NextResponse.json(
            { error: "session_id and a valid event are required", issues: parsed.error.issues },
            { status: 400 }
        );
    }

    const { session_id, event } = parsed.data;
    const state = loadSession(session_id);
    if (!state) {
        return NextResponse.json(
            { error: "Session not found" },
            { status: 404 }
        );
    }

    let next: SessionState;
    try {
        next = handleEvent(state, event);
    } catch (err) {
        return errorResponse(err);
    }

    if (next !== state) {
        saveSession(next);
        if (next.judgments !== state.judgments) {
            autosave(next, loadConfig().autosavePath);
        }
    }

    return NextResponse.json({ view: viewSession(next) });
}
