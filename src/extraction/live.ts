import { Effect, Layer } from "effect";
import { AppConfig } from "../config";
import { type BulkJobMachine, BulkExtractionLive } from "./bulk";
import { type ReportExtraction, ReportExtractionLive } from "./report";
import { type RestExtraction, RestExtractionLive } from "./rest";
import type { Extraction } from "./types";

/**
 * Extraction backed by the configured source and API type.
 */
export const ExtractionLive = Layer.unwrapEffect(
  Effect.map(
    AppConfig,
    (
      config
    ): Layer.Layer<Extraction, never, BulkJobMachine | RestExtraction | ReportExtraction> => {
      if (config.sync.source.type === "report") return ReportExtractionLive;
      return config.sync.apiType === "BULK" ? BulkExtractionLive : RestExtractionLive;
    }
  )
);
