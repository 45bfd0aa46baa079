import { canonicalizeMessage, canonicalizeScalar } from "./canonical";
import type { GeneratorConfig } from "./config";
import { DIFFICULT_CORPUS, MIDDLE_CORPUS, buildCompositeCorpus } from "./corpus/composite";
import type { CompositeCorpusDefinition } from "./corpus/composite";
import { MALFORMED_CASES } from "./corpus/malformed";
import { buildScalarCorpus } from "./corpus/scalars";
import type { ScalarInput } from "./corpus/scalars";
import { artifactPath, compareArtifact, writeArtifact } from "./emit/artifact";
import type { Artifact, ArtifactStatus, Tier } from "./emit/artifact";
import { renderMalformedArtifact } from "./emit/malformed";
import { renderMessageArtifact } from "./emit/message";
import { renderScalarArtifact } from "./emit/scalar";
import type { ScalarTable } from "./emit/scalar";
import { ArtifactStaleError } from "./errors";
import { toHex } from "./format";
import type { Logger } from "./logger";
import { renderTextproto } from "./oracle";
import type { Oracle, OracleRequest } from "./oracle";

export interface RenderedTier {
  artifact: Artifact;
  cases: number;
  oracleCalls: number;
}

export interface TierResult {
  tier: Tier;
  path: string;
  cases: number;
  oracleCalls: number;
  status: "written" | ArtifactStatus;
}

/**
 * Counts the calls made through it.
 */
class CountingOracle implements Oracle {
  calls = 0;

  constructor(private readonly inner: Oracle) {}

  encode(request: OracleRequest): Uint8Array {
    this.calls++;
    return this.inner.encode(request);
  }
}

function compositeDefinition(tier: "middle" | "difficult"): CompositeCorpusDefinition {
  return tier === "middle" ? MIDDLE_CORPUS : DIFFICULT_CORPUS;
}

/**
 * Oracle text of one simple-tier value.
 */
export function scalarText(input: ScalarInput): string {
  return `value: ${input.text}\n`;
}

function renderSimple(oracle: Oracle, codecModule: string): { source: string; cases: number } {
  const tables: ScalarTable[] = buildScalarCorpus().map((corpus) => ({
    kind: corpus.kind,
    fixtures: corpus.inputs.map((input) =>
      canonicalizeScalar(
        input,
        oracle.encode({
          schemaFile: corpus.message.schemaFile,
          messageType: corpus.message.name,
          text: scalarText(input),
          label: input.label,
        })
      )
    ),
  }));
  const cases = tables.reduce((sum, table) => sum + table.fixtures.length, 0);
  return { source: renderScalarArtifact(tables, codecModule), cases };
}

function renderComposite(
  tier: "middle" | "difficult",
  oracle: Oracle,
  codecModule: string
): { source: string; cases: number } {
  const corpus = buildCompositeCorpus(compositeDefinition(tier));
  const { message } = corpus;
  const fixtures = corpus.cases.map((input) =>
    canonicalizeMessage(
      message,
      input,
      oracle.encode({
        schemaFile: message.schemaFile,
        messageType: message.name,
        text: renderTextproto(message, input.value),
        label: `${tier}/${input.label}`,
      })
    )
  );
  return { source: renderMessageArtifact({ tier, message, fixtures }, codecModule), cases: fixtures.length };
}

function renderSource(tier: Tier, oracle: Oracle, codecModule: string): { source: string; cases: number } {
  switch (tier) {
    case "simple":
      return renderSimple(oracle, codecModule);
    case "middle":
    case "difficult":
      return renderComposite(tier, oracle, codecModule);
    case "malformed":
      return { source: renderMalformedArtifact(MALFORMED_CASES, codecModule), cases: MALFORMED_CASES.length };
  }
}

/**
 * Run one tier through corpus, oracle, canonicalization and emission.
 * Nothing touches the disk.
 */
export function renderTier(tier: Tier, oracle: Oracle, config: Pick<GeneratorConfig, "outDir" | "codecModule">): RenderedTier {
  const counting = new CountingOracle(oracle);
  const { source, cases } = renderSource(tier, counting, config.codecModule);
  return {
    artifact: { tier, path: artifactPath(config.outDir, tier), source },
    cases,
    oracleCalls: counting.calls,
  };
}

/**
 * Generate every configured tier in order. In check mode nothing is
 * written; stale or missing artifacts fail the run once all tiers were
 * compared.
 */
export function generate(config: GeneratorConfig, oracle: Oracle, logger: Logger): TierResult[] {
  const log = logger.child({ component: "pipeline" });
  const results: TierResult[] = [];

  for (const tier of config.tiers) {
    log.info({ tier }, "rendering tier");
    const { artifact, cases, oracleCalls } = renderTier(tier, oracle, config);
    let status: TierResult["status"];
    if (config.check) {
      status = compareArtifact(artifact);
    } else {
      writeArtifact(artifact);
      status = "written";
    }
    log.info({ tier, cases, oracleCalls, path: artifact.path, status }, "tier done");
    results.push({ tier, path: artifact.path, cases, oracleCalls, status });
  }

  const stale = results.filter((r) => r.status === "stale" || r.status === "missing").map((r) => r.path);
  if (stale.length > 0) {
    throw new ArtifactStaleError(stale);
  }
  return results;
}

export interface CorpusEntry {
  label: string;
  text: string;
}

/**
 * Every case of a tier with the text the oracle would receive. Malformed
 * cases have no oracle text; their bytes are shown as hex.
 */
export function renderCorpusText(tier: Tier): CorpusEntry[] {
  switch (tier) {
    case "simple":
      return buildScalarCorpus().flatMap((corpus) =>
        corpus.inputs.map((input) => ({ label: input.label, text: scalarText(input) }))
      );
    case "middle":
    case "difficult": {
      const corpus = buildCompositeCorpus(compositeDefinition(tier));
      return corpus.cases.map((input) => ({
        label: `${tier}/${input.label}`,
        text: renderTextproto(corpus.message, input.value),
      }));
    }
    case "malformed":
      return MALFORMED_CASES.map((c) => ({ label: c.name, text: `${toHex(c.bytes)}\n` }));
  }
}
