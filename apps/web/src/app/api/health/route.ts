import { NextResponse } from "next/server";

import { withRequestLog } from "@/lib/request-log";

export const GET = withRequestLog(async () => NextResponse.json({ status: "ok", timestamp: new Date().toISOString() }));
