import { NextRequest, NextResponse } from "next/server";
import { buildExportDocument, exportSessionCsv } from "@/lib/export";
import { loadSession } from "@/lib/sessionStore";

/**
 * GET /api/session/export?session_id=X&format=json|csv
 * Regenerates the export from the stored session on every call.
 */
export async function GET(request: NextRequest) {
    const sessionId = request.nextUrl.searchParams.get("session_id");
    const format = request.nextUrl.searchParams.get("format") ?? "json";
    if (!sessionId) {
        return NextResponse.json(
            { error: "session_id is required" },
            { status: 400 }
        );
    }
    if (format !== "json" && format !== "csv") {
        return NextResponse.json(
            { error: "format must be json or csv" },
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

    if (format === "csv") {
        return new NextResponse(exportSessionCsv(state), {
            headers: {
                "Content-Type": "text/csv; charset=utf-8",
                "Content-Disposition": `attachment; filename="${state.scale}_progress.csv"`,
            },
        });
    }

    return NextResponse.json(buildExportDocument(state));
}
