import { NextResponse } from "next/server";
import { z } from "zod";
import { errorResponse } from "@/lib/errors";
import { getServices } from "@/lib/services";
import type { ExplainResponse } from "@/lib/types";

export const dynamic = "force-dynamic";

const BodySchema = z.object({
  id: z.string().trim().min(1),
});

export async function POST(req: Request) {
  try {
    const { id } = BodySchema.parse(await req.json());
    const explanation = await getServices().analysis.explain(id);

    const response: ExplainResponse = { id, explanation };
    return NextResponse.json(response);
  } catch (e) {
    return errorResponse(e, "explain");
  }
}
