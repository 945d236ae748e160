export const map_color_constants = {
  emptyColor: "#ffffff",
  wallColor: "#1e293b",
  finalPathColor: "#facc15",
  startGoalColor: "#10b981",
  endGoalColor: "#ef4444",
} as const;
