import { NextResponse } from "next/server";
import { errorResponse } from "@/lib/errors";
import { getServices } from "@/lib/services";
import type { PointSummary } from "@/lib/types";

export const dynamic = "force-dynamic";

export async function GET() {
  try {
    const records = await getServices().store.list();
    const points: PointSummary[] = records.map((r) => ({
      id: r.id,
      location: `${r.latitude},${r.longitude}`,
      location_name: r.location_name,
      lat: r.latitude,
      lon: r.longitude,
      risk_score: r.risk_score,
      risk_level: r.risk_level,
      timestamp: r.timestamp,
    }));
    return NextResponse.json(points);
  } catch (e) {
    return errorResponse(e, "points");
  }
}
