/**
 * Stress harness for the decision engines.
 * Runs credit, claim and harvest scenarios against in-memory sources, prints each result
 * and checks the invariants; exits non-zero when any fails.
 *
 * Run: npm run stress
 */

import { scoreToGrade } from "../lib/creditScore";
import { createDecisionEngine } from "../lib/decisionEngine";
import { DEFAULT_ENGINE_CONFIG } from "../lib/engineConfig";
import type { ForecastDay, Grade } from "../lib/evidenceContract";
import { isDecisionEngineError } from "../lib/engineErrors";
import { createInMemorySources, type InMemoryEvidenceData } from "../lib/inMemorySources";
import { shiftIsoDate } from "../lib/evidenceSources";

const NOW = new Date("2026-06-15T09:00:00.000Z");
const TODAY = "2026-06-15";

const failures: string[] = [];

function check(name: string, ok: boolean, detail = "") {
  console.log(`  Invariant: ${name}? ${ok}${detail ? ` (${detail})` : ""}`);
  if (!ok) failures.push(name);
}

function forecast(days: Partial<ForecastDay>[]): ForecastDay[] {
  return days.map((d, i) => ({
    date: shiftIsoDate(TODAY, i),
    rainfallMm: d.rainfallMm ?? 0,
    temperatureC: d.temperatureC ?? 25,
    humidityPct: d.humidityPct ?? 60,
  }));
}

function scenarioData(): InMemoryEvidenceData {
  const farms = [
    { farmId: "farm-0", farmerId: "farmer-0", latitude: -1.2, longitude: 36.8 },
    ...Array.from({ length: 6 }, (_, i) => ({
      farmId: `farm-${i + 1}`,
      farmerId: `farmer-${i + 1}`,
      latitude: -1.2 + 0.01 * (i + 1),
      longitude: 36.8,
    })),
  ];
  return {
    farms,
    traditional: [
      {
        subjectId: "farmer-0",
        farmSizeAcres: 6,
        ndvi: 0.66,
        ndviObservedAt: "2026-06-10",
        climateRiskScore: 30,
        climateAssessedAt: "2026-05-30",
        payments: { total: 10, onTime: 8, latePaid: 2 },
        deforestationDetected: false,
        deforestationCheckedAt: "2026-04-01",
      },
      {
        subjectId: "farmer-thin",
        farmSizeAcres: null,
        ndvi: null,
        ndviObservedAt: null,
        climateRiskScore: null,
        climateAssessedAt: null,
        payments: { total: 0, onTime: 0, latePaid: 0 },
        deforestationDetected: true,
        deforestationCheckedAt: "2026-06-01",
      },
    ],
    actions: Array.from({ length: 8 }, (_, i) => ({
      subjectId: "farmer-0",
      actionId: `action-${i}`,
      actionType: ["mulching", "cover_crop", "agroforestry", "drip_irrigation"][i % 4],
      actionDate: shiftIsoDate(TODAY, -30 * (i + 1)),
      verified: i % 3 !== 0,
    })),
    reports: [
      ...Array.from({ length: 10 }, (_, i) => ({
        reportId: `own-${i}`,
        farmerId: "farmer-0",
        farmId: "farm-0",
        condition: i === 0 ? ("clear" as const) : ("light_rain" as const),
        temperatureFeel: "hot" as const,
        rainfallAmount: i === 0 ? ("none" as const) : ("light" as const),
        weatherTime: `${shiftIsoDate(TODAY, -3 - 20 * i)}T08:00:00.000Z`,
        reportedAt: `${shiftIsoDate(TODAY, -3 - 20 * i)}T09:00:00.000Z`,
        verified: i % 2 === 0,
        satelliteCorroborated: false,
      })),
      ...Array.from({ length: 4 }, (_, i) => ({
        reportId: `neighbor-${i}`,
        farmerId: `farmer-${i + 1}`,
        farmId: `farm-${i + 1}`,
        condition: i < 3 ? ("clear" as const) : ("heavy_rain" as const),
        temperatureFeel: "very_hot" as const,
        rainfallAmount: i < 3 ? ("none" as const) : ("heavy" as const),
        weatherTime: `${shiftIsoDate(TODAY, -4)}T10:00:00.000Z`,
        reportedAt: `${shiftIsoDate(TODAY, -4)}T11:00:00.000Z`,
        verified: true,
        satelliteCorroborated: false,
      })),
    ],
    scans: [
      { scanId: "scan-1", farmId: "farm-0", scanDate: shiftIsoDate(TODAY, -5), ndvi: 0.22, radarBackscatterDb: -11 },
    ],
    forecasts: {
      "farm-0": forecast([
        { rainfallMm: 30, humidityPct: 90 },
        { rainfallMm: 40, humidityPct: 88 },
        { rainfallMm: 20, humidityPct: 85 },
        { rainfallMm: 2, humidityPct: 70 },
        { rainfallMm: 0, humidityPct: 65 },
        { rainfallMm: 15, humidityPct: 90 },
        { rainfallMm: 20, humidityPct: 92 },
      ]),
      "farm-1": forecast(Array.from({ length: 7 }, () => ({ rainfallMm: 0, humidityPct: 55 }))),
    },
  };
}

async function main() {
  console.log("Decision engines: stress harness\n");
  const engine = createDecisionEngine({
    sources: createInMemorySources(scenarioData()),
    config: DEFAULT_ENGINE_CONFIG,
    now: () => NOW,
    logger: { debug: () => {}, info: () => {}, warn: () => {}, error: (m, c) => console.error(m, c) },
  });

  console.log("--- 1. Full-evidence credit score ---");
  const full = await engine.computeCreditScore("farmer-0");
  console.log(`Score: ${full.value}  Grade: ${full.grade}  Confidence: ${full.confidence}`);
  for (const s of full.subScores) console.log(`  ${s.name}: ${s.value} (effective weight ${s.effectiveWeight})`);
  check("score within 0–1000", full.value >= 0 && full.value <= 1000);
  check("effective weights sum to 1", Math.abs(full.subScores.reduce((a, s) => a + s.effectiveWeight, 0) - 1) < 1e-9);

  console.log("\n--- 2. Thin-file credit score (deforestation only) ---");
  const thin = await engine.computeCreditScore("farmer-thin");
  console.log(`Score: ${thin.value}  Grade: ${thin.grade}`);
  check("deforestation-only record grades F", thin.grade === "F");
  check("empty histories keep their weight", thin.subScores.every((s) => s.name === "traditional" || s.effectiveWeight === 0.3));

  console.log("\n--- 3. No evidence at all ---");
  try {
    await engine.computeCreditScore("farmer-unknown");
    check("unknown subject refused", false);
  } catch (error) {
    check("unknown subject refused with INSUFFICIENT_EVIDENCE", isDecisionEngineError(error) && error.code === "INSUFFICIENT_EVIDENCE");
  }

  console.log("\n--- 4. Drought claim ---");
  const claim = { subjectId: "farmer-0", farmId: "farm-0", claimDate: shiftIsoDate(TODAY, -4), claimType: "drought" };
  const verdict = await engine.verifyClaim(claim);
  console.log(`Confidence: ${verdict.confidence}  Recommendation: ${verdict.recommendation}`);
  for (const e of verdict.evidence) {
    console.log(`  ${e.sourceKind}: supports=${e.supportsClaim} available=${e.available} weight=${e.effectiveWeight}`);
  }
  const again = await engine.verifyClaim(claim);
  check("re-verification idempotent", JSON.stringify(again) === JSON.stringify(verdict));
  const history = await engine.getClaimVerdicts(verdict.claimId);
  check("verdict history keeps both entries", history.length === 2 && history[1].supersedes === 1);

  console.log("\n--- 5. Storm claim (satellite cannot observe) ---");
  const storm = await engine.verifyClaim({ ...claim, claimType: "storm" });
  console.log(`Confidence: ${storm.confidence}  Recommendation: ${storm.recommendation}`);
  check("satellite weight redistributed", storm.evidence.find((e) => e.sourceKind === "satellite")?.effectiveWeight === 0);

  console.log("\n--- 6. Wet-week harvest assessment ---");
  const wet = await engine.assessHarvest("farm-0");
  console.log(`Optimal: ${wet.optimalDate}  Road: ${wet.roadRisk.level}  Loss: ${wet.projectedLossPct}%  Urgency: ${wet.urgency}`);
  wet.recommendations.forEach((r) => console.log(`  - ${r}`));
  check("loss within 0–50", wet.projectedLossPct >= 0 && wet.projectedLossPct <= 50);
  check("HIGH road closes within 2 days", wet.roadRisk.level !== "HIGH" || (wet.roadRisk.daysUntilClosure ?? 99) <= 2);

  console.log("\n--- 7. Dry-week harvest assessment ---");
  const dry = await engine.assessHarvest("farm-1");
  console.log(`Optimal: ${dry.optimalDate}  Road: ${dry.roadRisk.level}  Urgency: ${dry.urgency}`);
  check("dry week is LOW urgency", dry.urgency === "LOW");

  console.log("\n--- 8. Grade banding totality ---");
  const grades: Record<Grade, number> = { A: 0, B: 0, C: 0, D: 0, F: 0 };
  for (let s = 0; s <= 1000; s++) grades[scoreToGrade(s)]++;
  console.log(`Distribution over 0–1000: ${JSON.stringify(grades)}`);
  check("every score graded", Object.values(grades).reduce((a, b) => a + b, 0) === 1001);

  console.log(`\nModel: credit v${engine.metadata().credit.version}, claims v${engine.metadata().claims.version}`);
  console.log(failures.length === 0 ? "\nAll invariants hold." : `\nFailed: ${failures.join(", ")}`);
  if (failures.length > 0) process.exitCode = 1;
}

main().catch((error) => {
  console.error("[stress] harness failed", error);
  process.exitCode = 1;
});
