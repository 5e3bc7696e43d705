import type { Express } from "express";
import { Router } from "express";
import { customerIdSchema } from "@shared/schema";
import { customerFormSchema } from "@shared/schemas";
import { asyncHandler } from "../middleware/errors";
import type { EngagementServices } from "../services/engagement";
import { notFound } from "../services/errors";
import defaultLogger, { type ServiceLogger } from "../logger";

export function registerCustomerRoutes(
  app: Express,
  services: EngagementServices,
  logger: ServiceLogger = defaultLogger,
): void {
  const { store, reporting, outreach } = services;
  const router = Router();

  router.post(
    "/",
    asyncHandler(async (req, res) => {
      const payload = customerFormSchema.parse(req.body);
      const existing = await store.customers.get(payload.id);
      const customer = await store.customers.upsert(payload);
      logger.info({ customerId: customer.id, segment: customer.segment }, existing ? "Updated customer" : "Added customer");
      res.status(existing ? 200 : 201).json(customer);
    }),
  );

  router.get(
    "/:id",
    asyncHandler(async (req, res) => {
      const customerId = customerIdSchema.parse(req.params.id);
      const customer = await store.customers.get(customerId);
      if (!customer) {
        throw notFound("Customer", customerId);
      }
      res.json(customer);
    }),
  );

  router.post(
    "/:id/deactivate",
    asyncHandler(async (req, res) => {
      const customerId = customerIdSchema.parse(req.params.id);
      const customer = await store.customers.update(customerId, { isActive: false });
      if (!customer) {
        throw notFound("Customer", customerId);
      }
      logger.info({ customerId }, "Deactivated customer");
      res.json(customer);
    }),
  );

  router.get(
    "/:id/engagement",
    asyncHandler(async (req, res) => {
      const customerId = customerIdSchema.parse(req.params.id);
      res.json(await reporting.customerEngagement(customerId));
    }),
  );

  router.get(
    "/:id/outreach",
    asyncHandler(async (req, res) => {
      const customerId = customerIdSchema.parse(req.params.id);
      res.json({ outreach: await outreach.listForCustomer(customerId) });
    }),
  );

  app.use("/api/customers", router);
}
