import { z } from "zod";

export const DocumentType = z.enum(["strategic_plan", "action_plan"]);
export const SectionType = z.enum(["strategic_objective", "action_item", "overview", "other"]);

export const Kpi = z.object({
  metric: z.string().min(1),
  target: z.union([z.number(), z.string()]).nullable().default(null),
  unit: z.string().default(""),
  deadline: z.string().nullable().default(null),
});

export const PlanSection = z.object({
  id: z.string().min(1),
  type: SectionType,
  title: z.string().min(1),
  content: z.string().default(""),
  kpis: z.array(Kpi).default([]),
  budget: z.number().nullable().optional(),
  timeline: z.string().nullable().optional(),
  goals: z.array(z.string()).default([]),
  initiatives: z.array(z.string()).default([]),
  priority: z.string().nullable().optional(),
});

export const PlanDocument = z.object({
  title: z.string().min(1),
  document_type: DocumentType,
  total_budget: z.number().nullable().optional(),
  sections: z.array(PlanSection),
});

export type KpiT = z.infer<typeof Kpi>;
export type PlanSectionT = z.infer<typeof PlanSection>;
export type PlanDocumentT = z.infer<typeof PlanDocument>;
