import { NextResponse } from "next/server";

export const dynamic = "force-static";

const GREETING = "🎉 Hello from the tubequiz service!";

export function GET() {
  return new NextResponse(GREETING, {
    status: 200,
    headers: { "content-type": "text/plain; charset=utf-8" },
  });
}
