import type { Express } from "express";
import { Router } from "express";
import { outreachIdSchema } from "@shared/schema";
import { outreachCompletionSchema, outreachRequestSchema } from "@shared/schemas";
import { asyncHandler } from "../middleware/errors";
import type { OutreachTracker } from "../services/outreach-tracker";

export function registerOutreachRoutes(app: Express, tracker: OutreachTracker): void {
  const router = Router();

  router.post(
    "/",
    asyncHandler(async (req, res) => {
      const { customerId, executiveName, executiveRole, scheduledFor } = outreachRequestSchema.parse(req.body);
      const outreach = await tracker.schedule(customerId, executiveName, executiveRole, scheduledFor);
      res.status(201).json(outreach);
    }),
  );

  router.post(
    "/:id/complete",
    asyncHandler(async (req, res) => {
      const outreachId = outreachIdSchema.parse(req.params.id);
      const { outcome, trustDelta, durationMinutes } = outreachCompletionSchema.parse(req.body);
      const result = await tracker.complete(outreachId, outcome, trustDelta, durationMinutes);
      res.json(result);
    }),
  );

  app.use("/api/outreach", router);
}
