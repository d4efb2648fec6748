export { AdminDashboard } from "./dashboard.js";
export type { CampaignSummary, DashboardStats, TokenTotals } from "./types.js";
