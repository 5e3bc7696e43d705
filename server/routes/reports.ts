import type { Express } from "express";
import { reportQuerySchema } from "@shared/schemas";
import { asyncHandler } from "../middleware/errors";
import type { ReportingAggregator } from "../services/reporting";

export function registerReportRoutes(app: Express, reporting: ReportingAggregator): void {
  app.get(
    "/api/reports/engagement",
    asyncHandler(async (req, res) => {
      const { start, end } = reportQuerySchema.parse(req.query);
      const report = await reporting.engagementReport(start, end);
      res.json(report);
    }),
  );
}
