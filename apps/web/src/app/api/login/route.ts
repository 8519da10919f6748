import { NextResponse } from "next/server";

import { requireBasicAuth } from "@/lib/auth";
import { errorResponse } from "@/lib/errors";
import { withRequestLog } from "@/lib/request-log";
import { getService } from "@/lib/service";

export const POST = withRequestLog(async (request, _context, log) => {
  const unauthorized = requireBasicAuth(request);
  if (unauthorized) {
    return unauthorized;
  }

  try {
    const service = await getService();
    if (await service.login()) {
      return NextResponse.json({ status: "success" });
    }
    return NextResponse.json({ status: "failed", error: "Login failed" }, { status: 401 });
  } catch (error) {
    return errorResponse(error, log);
  }
});
