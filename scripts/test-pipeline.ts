/**
 * Quick smoke test: runs the offline stages on canned cards with a
 * stub model. No browser, network or database.
 * Run: npx tsx scripts/test-pipeline.ts
 */
import { extractPosting } from "../src/extract.ts";
import { filterEligible } from "../src/filter.ts";
import type { LanguageModel } from "../src/llm.ts";
import { matchPostings } from "../src/matcher.ts";
import { renderCsv } from "../src/output.ts";
import { normalizeSalaries } from "../src/salary.ts";
import { createLogger } from "../src/utils/logger.ts";
import type { JobPosting } from "../src/utils/types.ts";

const logger = createLogger({ logDir: null, debug: true });

const cards = [
  {
    card: "Promoted\nSenior Backend Engineer\n\nNorthwind Labs\n\nToronto, ON (Hybrid)\n\n3 days ago",
    detail: {
      text: "About the job\nBuild APIs in TypeScript and Postgres.\n\nSalary: $120,000 - $140,000 per year. Eligible for a raise after review.",
      isReposted: false,
      url: "https://jobs.example.com/view/101",
    },
  },
  {
    card: "Platform Engineer\n\nContoso Cloud\n\nVancouver, BC\n\nReposted 1 week ago",
    detail: {
      text: "About the job\nKubernetes, Terraform, on-call rotation.",
      isReposted: true,
      url: "https://jobs.example.com/view/102",
    },
  },
  { card: "Broken card without segments", detail: undefined },
];

// Replies by prompt content, so the stub needs no network
const stubModel: LanguageModel = {
  async complete(request) {
    if (request.prompt.includes("Extract annual salary")) {
      return 'Here you go: {"min": 120000, "max": 140000, "currency": "CAD"}';
    }
    return JSON.stringify({
      match_score: 84,
      reasoning: "Strong TypeScript and Postgres overlap. Seniority fits.",
      missing_skills: ["Kafka"],
    });
  },
};

const resume = "Backend engineer, 7 years of TypeScript, Node.js, Postgres and AWS.";

async function main(): Promise<void> {
  console.log("=== Extraction ===");
  const postings: JobPosting[] = [];
  for (const { card, detail } of cards) {
    const result = extractPosting(card, detail);
    if (result.ok) {
      postings.push(result.posting);
      console.log(`  ${result.posting.title} at ${result.posting.company} | salary: ${result.posting.salaryRaw || "(none)"}`);
    } else {
      console.log(`  skipped: ${result.error.message}`);
    }
  }

  console.log("\n=== Filter ===");
  const { kept, removed } = filterEligible(postings, {
    companyList: ["Northwind Labs"],
    salaryRequired: false,
    keepReposted: false,
  });
  console.log(`  kept ${kept.length}, removed ${removed.length}`);

  console.log("\n=== Salary + Match ===");
  const salaried = await normalizeSalaries(kept, stubModel, logger);
  const matched = await matchPostings(
    salaried.postings,
    stubModel,
    {
      resume,
      jobType: null,
      currentSalary: null,
      threshold: 80,
      maxDescriptionTokens: 10_000,
      cache: null,
    },
    logger
  );
  for (const p of matched.postings) {
    console.log(
      `  ${p.title} → ${p.salary.min}-${p.salary.max} ${p.salary.currency}, score ${p.match.score ?? "n/a"}, apply: ${p.recommendApply}`
    );
  }

  console.log("\n=== CSV ===");
  console.log(renderCsv(matched.postings));
  console.log("✓ Pipeline simulation complete");
}

main().catch((err) => {
  console.error(err);
  process.exit(1);
});
