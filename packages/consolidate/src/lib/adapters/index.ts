import type { QualityTier, RawDocument, SourceName, SourceRecord } from "../types";
import { adaptASpeakers } from "./a-speakers";
import { adaptAllAmericanSpeakers } from "./allamericanspeakers";
import { adaptBigSpeak } from "./bigspeak";
import { adaptEventRaptor } from "./eventraptor";
import { adaptFreeSpeakerBureau } from "./freespeakerbureau";
import { adaptLeadingAuthorities } from "./leading-authorities";
import { adaptLlmParsed } from "./llm-parsed";
import { adaptSessionize } from "./sessionize";
import { adaptSpeakerHub } from "./speakerhub";
import type { AdapterContext } from "./fields";
import { adaptTheSpeakerHandbook } from "./thespeakerhandbook";

export type { AdapterContext } from "./fields";

export type SourceAdapter = (doc: RawDocument, tier: QualityTier, context: AdapterContext) => SourceRecord;

export const SOURCE_ADAPTERS: Record<SourceName, SourceAdapter> = {
  a_speakers: adaptASpeakers,
  allamericanspeakers: adaptAllAmericanSpeakers,
  bigspeak: adaptBigSpeak,
  eventraptor: adaptEventRaptor,
  freespeakerbureau: adaptFreeSpeakerBureau,
  leading_authorities: adaptLeadingAuthorities,
  llm_parsed_db: adaptLlmParsed,
  sessionize: adaptSessionize,
  speakerhub: adaptSpeakerHub,
  thespeakerhandbook: adaptTheSpeakerHandbook,
};
