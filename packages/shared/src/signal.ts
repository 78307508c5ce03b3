export const SIGNAL_COLORS = ["none", "red", "yellow", "green"] as const;

export type SignalColor = (typeof SIGNAL_COLORS)[number];

export const INITIAL_SIGNAL_COLOR: SignalColor = "none";

export function isSignalColor(value: unknown): value is SignalColor {
  return typeof value === "string" && (SIGNAL_COLORS as readonly string[]).includes(value);
}

/** Payload of the out-of-band `GET /status` poll. */
export interface SignalStatus {
  current_color: SignalColor;
  total_users: number;
  controller_id: string | null;
}
