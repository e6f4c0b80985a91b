import { NextResponse } from "next/server";
import { z } from "zod";
import { errorResponse } from "@/lib/errors";
import { parseLocation } from "@/lib/geo";
import { getServices } from "@/lib/services";
import type { AnalyzeResponse } from "@/lib/types";

export const dynamic = "force-dynamic";

const BodySchema = z.object({
  location: z.string({ required_error: "Missing location parameter" }).trim().min(1, "Missing location parameter"),
});

export async function POST(req: Request) {
  try {
    const body = BodySchema.parse(await req.json());
    const { lat, lon } = parseLocation(body.location);

    const { record, stored } = await getServices().analysis.analyze(lat, lon);

    const response: AnalyzeResponse = { ...record, location: `${lat},${lon}`, stored };
    return NextResponse.json(response);
  } catch (e) {
    return errorResponse(e, "analyze");
  }
}
