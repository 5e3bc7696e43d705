import type { Express } from "express";
import { Router } from "express";
import { z } from "zod";
import { followUpIdSchema, sessionIdSchema } from "@shared/schema";
import {
  attendanceRequestSchema,
  followUpRequestSchema,
  followUpStatusUpdateSchema,
  programRequestSchema,
  registrationRequestSchema,
  scheduleSessionSchema,
} from "@shared/schemas";
import { asyncHandler } from "../middleware/errors";
import type { EngagementServices } from "../services/engagement";
import { schedulePostIncidentProgram } from "../services/program";
import { DEFAULT_UPCOMING_LIMIT } from "../services/session-catalog";

const upcomingQuerySchema = z.object({
  limit: z.coerce.number().int().positive().default(DEFAULT_UPCOMING_LIMIT),
});

export function registerSessionRoutes(app: Express, services: EngagementServices): void {
  const { catalog, ledger, clock } = services;
  const router = Router();

  router.post(
    "/",
    asyncHandler(async (req, res) => {
      const payload = scheduleSessionSchema.parse(req.body);
      const session = await catalog.schedule(payload);
      res.status(201).json(session);
    }),
  );

  router.get(
    "/upcoming",
    asyncHandler(async (req, res) => {
      const { limit } = upcomingQuerySchema.parse(req.query);
      const sessions = await catalog.upcoming(clock.now(), limit);
      res.json({ sessions });
    }),
  );

  router.get(
    "/:id",
    asyncHandler(async (req, res) => {
      const sessionId = sessionIdSchema.parse(req.params.id);
      const session = await catalog.get(sessionId);
      const [registrations, followUpActions] = await Promise.all([
        ledger.listRegistrations(sessionId),
        ledger.listFollowUps(sessionId),
      ]);
      res.json({ ...session, registrations, followUpActions });
    }),
  );

  router.post(
    "/:id/registrations",
    asyncHandler(async (req, res) => {
      const sessionId = sessionIdSchema.parse(req.params.id);
      const { customerId, email, questions } = registrationRequestSchema.parse(req.body);
      const registration = await ledger.register(sessionId, customerId, { email, questions });
      res.status(201).json(registration);
    }),
  );

  router.post(
    "/:id/attendance",
    asyncHandler(async (req, res) => {
      const sessionId = sessionIdSchema.parse(req.params.id);
      const { customerId, attended, feedback } = attendanceRequestSchema.parse(req.body);
      const result = await ledger.recordAttendance(sessionId, customerId, attended, feedback);
      res.json(result);
    }),
  );

  router.post(
    "/:id/follow-ups",
    asyncHandler(async (req, res) => {
      const sessionId = sessionIdSchema.parse(req.params.id);
      const payload = followUpRequestSchema.parse(req.body);
      const action = await ledger.addFollowUp(sessionId, payload);
      res.status(201).json(action);
    }),
  );

  app.use("/api/sessions", router);

  app.patch(
    "/api/follow-ups/:id",
    asyncHandler(async (req, res) => {
      const actionId = followUpIdSchema.parse(req.params.id);
      const { status } = followUpStatusUpdateSchema.parse(req.body);
      const action = await ledger.advanceFollowUp(actionId, status);
      res.json(action);
    }),
  );

  app.post(
    "/api/programs/post-incident",
    asyncHandler(async (req, res) => {
      const { start } = programRequestSchema.parse(req.body ?? {});
      const now = clock.now();
      const sessions = await schedulePostIncidentProgram(catalog, start ?? now, now);
      res.status(201).json({ scheduled: sessions.length, sessions });
    }),
  );
}
