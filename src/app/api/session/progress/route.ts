import { NextRequest, NextResponse } from "next/server";
import { firstUnjudged } from "@/lib/progress";
import { viewSession } from "@/lib/session";
import { loadSession } from "@/lib/sessionStore";

/**
 * GET /api/session/progress?session_id=X
 * Returns judgment counts for a session.
 */
export async function GET(request: NextRequest) {
    const sessionId = request.nextUrl.searchParams.get("session_id");
    if (!sessionId) {
        return NextResponse.json(
            { error: "session_id is required" },
            { status: 400 }
        );
    }

    const state = loadSession(sessionId);
    if (!state) {
        return NextResponse.json(
            { error: "Session not found" },
            { status: 404 }
        );
    }

    const view = viewSession(state);
    const next = firstUnjudged(state.order, state.judgments);

    return NextResponse.json({
        completed: view.judged,
        total: view.total,
        remaining: view.remaining,
        next_unjudged: next < state.order.length ? state.order[next] : null,
    });
}
