import { NextResponse } from "next/server";
import { z } from "zod";
import { errorResponse } from "@/lib/errors";
import { getServices } from "@/lib/services";
import type { ChatResponse } from "@/lib/types";

export const dynamic = "force-dynamic";

const BodySchema = z.object({
  message: z.string({ required_error: "Empty message" }),
  session_id: z.string().min(1).nullable().optional(),
});

export async function POST(req: Request) {
  try {
    const body = BodySchema.parse(await req.json());
    const { reply, sessionId } = await getServices().chat.chat(body.session_id ?? undefined, body.message);

    const response: ChatResponse = { reply, session_id: sessionId };
    return NextResponse.json(response);
  } catch (e) {
    return errorResponse(e, "chat");
  }
}
