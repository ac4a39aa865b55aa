import { z } from "zod";
import type { CapabilityFn } from "../orchestrator/capabilities";
import type {
  DiseaseInfo,
  HealthAssessment,
  HealthIssueRecord,
  IdentifiedPlant,
  SeverityLevel,
} from "../orchestrator/state";
import { missingKey, requestJson, type HttpOptions } from "./http";

const IDENTIFY_URL = "https://api.plant.id/v3/identification";
const HEALTH_URL = "https://api.plant.id/v3/health_assessment";

/** Identifications below this probability are reported as not identified. */
export const MIN_IDENTIFICATION_CONFIDENCE = 0.7;

// ---------------------------------------------------------------------------
// Response schemas (only the fields we read)
// ---------------------------------------------------------------------------

const textValue = z.object({ value: z.string().optional() }).partial().optional();

const issueSchema = z.object({
  name: z.string().default("Unknown"),
  probability: z.number().default(0),
  details: z
    .object({
      description: textValue,
      treatment: z.record(z.array(z.string())).optional(),
    })
    .partial()
    .optional(),
});

const binarySchema = z
  .object({ binary: z.boolean().optional(), probability: z.number().optional() })
  .optional();

const resultSchema = z.object({
  result: z
    .object({
      is_plant: binarySchema,
      is_healthy: binarySchema,
      classification: z
        .object({
          suggestions: z
            .array(
              z.object({
                name: z.string().default("Unknown"),
                probability: z.number().default(0),
                details: z
                  .object({
                    common_names: z.array(z.string()).nullish(),
                    taxonomy: z.object({ family: z.string().optional() }).partial().nullish(),
                  })
                  .partial()
                  .optional(),
              }),
            )
            .default([]),
        })
        .optional(),
      disease: z.object({ suggestions: z.array(issueSchema).default([]) }).optional(),
      health_assessment: z
        .object({
          is_healthy: binarySchema,
          diseases: z.array(issueSchema).default([]),
          pests: z.array(issueSchema).default([]),
        })
        .optional(),
    })
    .default({}),
});

type PlantIdResult = z.infer<typeof resultSchema>["result"];
type Issue = z.infer<typeof issueSchema>;

// ---------------------------------------------------------------------------
// Mapping
// ---------------------------------------------------------------------------

const TREATMENT_FALLBACK =
  "Consult with a plant specialist for specific treatment recommendations.";

function toIssue(i: Issue): HealthIssueRecord {
  // treatment arrives grouped, e.g. { biological: [...], prevention: [...] }
  const steps = Object.values(i.details?.treatment ?? {}).flat();
  return {
    name: i.name,
    probability: i.probability,
    description: i.details?.description?.value ?? "",
    treatment: steps.length > 0 ? steps.join(" ") : TREATMENT_FALLBACK,
  };
}

function byProbability(a: HealthIssueRecord, b: HealthIssueRecord): number {
  return b.probability - a.probability;
}

function healthFromIdentification(r: PlantIdResult): HealthAssessment {
  const diseases = (r.disease?.suggestions ?? []).slice(0, 3).map(toIssue);
  const topProbability = diseases[0]?.probability ?? 0;
  return {
    isHealthy: (r.is_healthy?.binary ?? true) && !(topProbability > 0.3),
    healthConfidence: r.is_healthy?.probability ?? 1,
    diseases,
    pests: [],
  };
}

export function mapIdentification(
  r: PlantIdResult,
  minConfidence = MIN_IDENTIFICATION_CONFIDENCE,
): IdentifiedPlant {
  const unidentified = (confidence: number): IdentifiedPlant => ({
    identified: false,
    name: "Unknown",
    scientificName: "",
    confidence,
    commonNames: [],
  });

  if (!r.is_plant?.binary) return unidentified(0);
  const top = r.classification?.suggestions[0];
  if (!top) return unidentified(0);
  if (top.probability < minConfidence) return unidentified(top.probability);

  return {
    identified: true,
    name: top.name,
    scientificName: top.name,
    confidence: top.probability,
    family: top.details?.taxonomy?.family,
    commonNames: top.details?.common_names ?? [],
    health: healthFromIdentification(r),
  };
}

/** Highest issue probability mapped onto a severity band. */
export function severityLevel(issues: HealthIssueRecord[]): SeverityLevel {
  const max = Math.max(0, ...issues.map((i) => i.probability));
  if (max >= 0.8) return "Critical";
  if (max >= 0.6) return "High";
  if (max >= 0.3) return "Moderate";
  if (max > 0) return "Low";
  return "Healthy";
}

/** 1 when healthy; diseases weigh 0.7 and pests 0.5 per unit of probability. */
export function healthScore(
  diseases: HealthIssueRecord[],
  pests: HealthIssueRecord[],
  isHealthyProbability: number,
): number {
  if (diseases.length === 0 && pests.length === 0) {
    return Math.round(isHealthyProbability * 100) / 100;
  }
  const impact = Math.min(
    1,
    diseases.reduce((a, d) => a + d.probability * 0.7, 0) +
      pests.reduce((a, p) => a + p.probability * 0.5, 0),
  );
  const score = Math.max(0, Math.min(isHealthyProbability, 1 - impact));
  return Math.round(score * 100) / 100;
}

export function recommendations(
  diseases: HealthIssueRecord[],
  pests: HealthIssueRecord[],
  isHealthy: boolean,
): string[] {
  if (isHealthy && diseases.length === 0 && pests.length === 0) {
    return [
      "Your plant appears healthy! Continue with regular care.",
      "Monitor regularly for any changes in appearance.",
      "Maintain consistent watering and lighting conditions.",
    ];
  }
  const out: string[] = [];
  if (diseases.length > 0) {
    out.push(
      "Disease detected - isolate plant from other plants if possible.",
      "Remove affected leaves or parts if safe to do so.",
      "Improve air circulation around the plant.",
      "Avoid overhead watering to prevent spread.",
    );
  }
  if (pests.length > 0) {
    out.push(
      "Pest activity detected - inspect plant thoroughly.",
      "Consider using insecticidal soap or neem oil.",
      "Check surrounding plants for similar issues.",
      "Quarantine if infestation is severe.",
    );
  }
  out.push("Consider consulting with a local plant expert or extension service.");
  return out;
}

export function mapHealthAssessment(r: PlantIdResult): DiseaseInfo {
  if (!r.is_plant?.binary) {
    return {
      isHealthy: false,
      healthScore: 0,
      diseases: [],
      pests: [],
      severity: "Unknown",
      recommendations: ["Image does not appear to contain a plant"],
    };
  }
  const assessment = r.health_assessment;
  const healthyProbability =
    assessment?.is_healthy?.probability ?? r.is_healthy?.probability ?? 1;
  const diseases = (assessment?.diseases ?? r.disease?.suggestions ?? [])
    .map(toIssue)
    .sort(byProbability);
  const pests = (assessment?.pests ?? []).map(toIssue).sort(byProbability);
  const isHealthy = healthyProbability > 0.5;

  return {
    isHealthy,
    healthScore: healthScore(diseases, pests, healthyProbability),
    diseases,
    pests,
    severity: severityLevel([...diseases, ...pests]),
    recommendations: recommendations(diseases, pests, isHealthy),
  };
}

// ---------------------------------------------------------------------------
// Client
// ---------------------------------------------------------------------------

export interface PlantIdOptions extends HttpOptions {
  apiKey?: string;
  minConfidence?: number;
}

export interface PlantIdClient {
  identify: CapabilityFn<"identify">;
  detectDisease: CapabilityFn<"detect_disease">;
}

/** plant.id v3 identification and health assessment. */
export function createPlantIdClient(options: PlantIdOptions): PlantIdClient {
  const { apiKey, fetch: fetchFn } = options;
  const minConfidence = options.minConfidence ?? MIN_IDENTIFICATION_CONFIDENCE;

  const post = (url: string, body: Record<string, unknown>, key: string) =>
    requestJson(
      "Plant.id",
      url,
      {
        method: "POST",
        headers: { "Content-Type": "application/json", "Api-Key": key },
        body: JSON.stringify(body),
      },
      resultSchema,
      fetchFn,
    );

  return {
    identify: async ({ image }) => {
      if (!apiKey) return missingKey("Plant.id");
      const res = await post(
        IDENTIFY_URL,
        { images: [image], similar_images: true, classification_level: "all", health: "all" },
        apiKey,
      );
      return res.ok ? { ok: true, data: mapIdentification(res.data.result, minConfidence) } : res;
    },
    detectDisease: async ({ image }) => {
      if (!apiKey) return missingKey("Plant.id");
      const res = await post(
        HEALTH_URL,
        { images: [image], similar_images: true, health: "all" },
        apiKey,
      );
      return res.ok ? { ok: true, data: mapHealthAssessment(res.data.result) } : res;
    },
  };
}
