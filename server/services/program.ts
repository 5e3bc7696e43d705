import { addDays, addWeeks, set } from "date-fns";
import type { Session } from "@shared/schema";
import type { PlannedSession } from "@shared/schemas";
import type { SessionCatalog } from "./session-catalog";

export const EMERGENCY_PERIOD_DAYS = 14;
export const POWER_USER_WEEKS = 12;
export const EXECUTIVE_SESSIONS = 6;

const at = (day: Date, hours: number) => set(day, { hours, minutes: 0, seconds: 0, milliseconds: 0 });

/**
 * Session plan for the weeks after an incident: two emergency sessions a day
 * for the first two weeks, then weekly power-user and four-weekly executive
 * sessions.
 */
export function buildPostIncidentProgram(start: Date): PlannedSession[] {
  const plan: PlannedSession[] = [];

  for (let day = 0; day < EMERGENCY_PERIOD_DAYS; day++) {
    const date = addDays(start, day);
    plan.push({
      type: "emergency",
      scheduledAt: at(date, 10),
      durationMinutes: 30,
      capacity: 50,
      facilitators: ["engineering-lead@example.com", "customer-success@example.com"],
      description: "Emergency Office Hours - Addressing Post-Incident Concerns",
      agenda: [
        "Incident update and current status",
        "Prevention measures implemented",
        "Open Q&A session",
        "Individual follow-up scheduling",
      ],
      recordingUrl: null,
      backdated: false,
    });
    plan.push({
      type: "emergency",
      scheduledAt: at(date, 17),
      durationMinutes: 30,
      capacity: 50,
      facilitators: ["product-manager@example.com", "customer-success@example.com"],
      description: "Emergency Office Hours - Evening Session",
      agenda: ["Day's progress summary", "Addressing specific customer concerns", "Roadmap transparency session"],
      recordingUrl: null,
      backdated: false,
    });
  }

  const ongoingStart = addWeeks(start, 2);
  for (let week = 0; week < POWER_USER_WEEKS; week++) {
    plan.push({
      type: "power_user",
      scheduledAt: at(addWeeks(ongoingStart, week), 14),
      durationMinutes: 60,
      capacity: 25,
      facilitators: ["senior-engineer@example.com", "product-specialist@example.com"],
      description: "Power User Office Hours - Advanced Features & Best Practices",
      agenda: [
        "Advanced feature deep-dive",
        "Customer success story sharing",
        "Beta feature previews",
        "Integration best practices",
      ],
      recordingUrl: null,
      backdated: false,
    });
  }

  for (let month = 0; month < EXECUTIVE_SESSIONS; month++) {
    plan.push({
      type: "executive",
      scheduledAt: at(addWeeks(ongoingStart, month * 4), 16),
      durationMinutes: 45,
      capacity: 15,
      facilitators: ["cto@example.com", "vp-customer-success@example.com"],
      description: "Executive Office Hours - Strategic Partnership & Roadmap",
      agenda: [
        "Product roadmap updates",
        "Strategic partnership opportunities",
        "Industry trends discussion",
        "Executive feedback collection",
      ],
      recordingUrl: null,
      backdated: false,
    });
  }

  return plan.sort((a, b) => a.scheduledAt.getTime() - b.scheduledAt.getTime());
}

/**
 * Schedules the plan through the catalog. Slots that already lie in the past
 * relative to `now` (the morning session of a program started mid-day) are
 * skipped.
 */
export async function schedulePostIncidentProgram(
  catalog: SessionCatalog,
  start: Date,
  now: Date,
): Promise<Session[]> {
  const scheduled: Session[] = [];
  for (const planned of buildPostIncidentProgram(start)) {
    if (planned.scheduledAt.getTime() < now.getTime()) continue;
    scheduled.push(await catalog.schedule(planned));
  }
  return scheduled;
}
