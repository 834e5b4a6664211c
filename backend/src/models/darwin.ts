import { z } from "zod";

const clockOrEmpty = z.string().trim().optional();

// One location of a Darwin XmlTimetable journey (OR/IP/PP/DT/OPOR/...).
export const timetableLocationSchema = z.object({
  tpl: z.string().trim().min(1),
  act: z.string().optional(),
  pta: clockOrEmpty,
  ptd: clockOrEmpty,
  wta: clockOrEmpty,
  wtd: clockOrEmpty,
  wtp: clockOrEmpty,
  plat: z.string().optional(),
});

export const timetableJourneySchema = z.object({
  rid: z.string().trim().min(1),
  uid: z.string().default("unknown"),
  trainId: z.string().default("0000"),
  toc: z.string().default("unknown"),
  ssd: z.string(),
  isPassengerSvc: z.boolean().optional(),
  locations: z.array(timetableLocationSchema),
});

export const timetableSnapshotSchema = z.object({
  date: z.string().optional(),
  generatedAt: z.string().optional(),
  journeys: z.array(z.unknown()),
});

export type TimetableLocation = z.infer<typeof timetableLocationSchema>;
export type TimetableJourney = z.infer<typeof timetableJourneySchema>;
export type TimetableSnapshot = z.infer<typeof timetableSnapshotSchema>;

/**
 * A movement message as delivered by the feed transport: one report for one
 * service at one location, or a service-level cancellation/reinstatement.
 */
export const rawMovementMessageSchema = z.object({
  type: z.string().trim().min(1),
  rid: z.string().trim().min(1),
  tpl: z.string().trim().optional(),
  event: z.string().trim().optional(),
  et: z.string().trim().optional(),
  at: z.string().trim().optional(),
  ts: z.string().trim().min(1),
});

export type RawMovementMessage = z.infer<typeof rawMovementMessageSchema>;
