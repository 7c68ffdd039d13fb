import { NextResponse } from "next/server";
import { getProviderStatus, loadAppConfig } from "@/lib/config";

export async function GET() {
  return NextResponse.json(getProviderStatus(loadAppConfig()));
}
