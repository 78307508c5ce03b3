import type { SignalStatus } from "@lamplight/shared";

import type { SignalCoordinator } from "../signal/index.js";

export interface StatusRouteDeps {
  coordinator: Pick<SignalCoordinator, "statusSnapshot">;
}

const corsHeaders: Record<string, string> = {
  "Access-Control-Allow-Origin": "*",
  "Access-Control-Allow-Methods": "GET, OPTIONS",
  "Access-Control-Allow-Headers": "Content-Type",
};

function jsonResponse(data: unknown, status = 200): Response {
  return new Response(JSON.stringify(data), {
    status,
    headers: { "Content-Type": "application/json", ...corsHeaders },
  });
}

function handleGet(deps: StatusRouteDeps): Response {
  const snapshot = deps.coordinator.statusSnapshot();
  const body: SignalStatus = {
    current_color: snapshot.color,
    total_users: snapshot.totalUsers,
    controller_id: snapshot.controllerIdentity,
  };
  return jsonResponse(body);
}

export async function handleStatusRequest(
  req: Request,
  deps: StatusRouteDeps,
): Promise<Response | null> {
  const { pathname } = new URL(req.url);
  if (pathname !== "/status") return null;

  if (req.method === "OPTIONS") {
    return new Response(null, { status: 204, headers: corsHeaders });
  }
  if (req.method === "GET") return handleGet(deps);

  return new Response("Method Not Allowed", { status: 405, headers: corsHeaders });
}
