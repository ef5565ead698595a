// Prompt templates for extraction, summarization, reporting and answering

export const GRAPH_FIELD_SEP = '<SEP>';

export const DEFAULT_TUPLE_DELIMITER = '<|>';
export const DEFAULT_RECORD_DELIMITER = '##';
export const DEFAULT_COMPLETION_DELIMITER = '<|COMPLETE|>';

export const DEFAULT_ENTITY_TYPES = [
  'organization',
  'person',
  'geo',
  'event',
] as const;

// Broader type set used by the two-pass extractor
export const META_ENTITY_TYPES = [
  'organization',
  'person',
  'location',
  'event',
  'product',
  'technology',
  'concept',
  'date',
  'work',
  'law',
] as const;

export const FAIL_RESPONSE =
  "Sorry, I'm not able to provide an answer to that question.";

export interface ExtractionDelimiters {
  tuple: string;
  record: string;
  completion: string;
}

export const DEFAULT_DELIMITERS: ExtractionDelimiters = {
  tuple: DEFAULT_TUPLE_DELIMITER,
  record: DEFAULT_RECORD_DELIMITER,
  completion: DEFAULT_COMPLETION_DELIMITER,
};

/**
 * Fill `{name}` placeholders. Unknown placeholders are left untouched so
 * literal braces in examples survive.
 */
export function formatPrompt(
  template: string,
  values: Record<string, string>,
): string {
  return template.replace(/\{(\w+)\}/g, (match, key: string) =>
    Object.hasOwn(values, key) ? values[key] : match,
  );
}

const ENTITY_FORMAT = `For each identified entity, extract:
- entity_name: name of the entity, capitalized
- entity_type: one of [{entity_types}]
- entity_description: comprehensive description of the entity's attributes and activities
Format each entity as ("entity"{tuple_delimiter}<entity_name>{tuple_delimiter}<entity_type>{tuple_delimiter}<entity_description>)`;

const RELATION_FORMAT = `For each pair of (source_entity, target_entity) that are clearly related, extract:
- source_entity: name of the source entity
- target_entity: name of the target entity
- relationship_description: why the two entities are related
- relationship_strength: a number from 1 to 10
Format each relationship as ("relationship"{tuple_delimiter}<source_entity>{tuple_delimiter}<target_entity>{tuple_delimiter}<relationship_description>{tuple_delimiter}<relationship_strength>)`;

const OUTPUT_RULES = `Return output in English as a single list of all the entities and relationships. Use **{record_delimiter}** as the list delimiter.
When finished, output {completion_delimiter}`;

export const PROMPTS = {
  entityExtraction: `-Goal-
Given a text document and a list of entity types, identify all entities of those types and all relationships among the identified entities.

-Steps-
1. ${ENTITY_FORMAT}

2. ${RELATION_FORMAT}

3. ${OUTPUT_RULES}

-Example-
Text: Mara Quill founded Lantern Works in Oslo.
Output:
("entity"{tuple_delimiter}"MARA QUILL"{tuple_delimiter}"person"{tuple_delimiter}"Mara Quill is the founder of Lantern Works."){record_delimiter}
("entity"{tuple_delimiter}"LANTERN WORKS"{tuple_delimiter}"organization"{tuple_delimiter}"Lantern Works is a company founded in Oslo."){record_delimiter}
("entity"{tuple_delimiter}"OSLO"{tuple_delimiter}"geo"{tuple_delimiter}"Oslo is the city where Lantern Works was founded."){record_delimiter}
("relationship"{tuple_delimiter}"MARA QUILL"{tuple_delimiter}"LANTERN WORKS"{tuple_delimiter}"Mara Quill founded Lantern Works."{tuple_delimiter}9){record_delimiter}
("relationship"{tuple_delimiter}"LANTERN WORKS"{tuple_delimiter}"OSLO"{tuple_delimiter}"Lantern Works was founded in Oslo."{tuple_delimiter}6){completion_delimiter}

-Real Data-
Entity_types: {entity_types}
Text: {input_text}
Output:
`,

  hiEntityExtraction: `-Goal-
Given a text document and a list of entity types, identify every entity of those types mentioned in the text. Do not extract relationships.

-Steps-
1. ${ENTITY_FORMAT}

2. ${OUTPUT_RULES}

-Real Data-
Entity_types: {entity_types}
Text: {input_text}
Output:
`,

  hiRelationExtraction: `-Goal-
Given a text document and the entities already found in it, identify all relationships among those entities.

-Steps-
1. ${RELATION_FORMAT}
Prefer the entity names listed below; add a new entity name only when the text clearly requires it.

2. ${OUTPUT_RULES}

-Real Data-
Entities: {entities}
Text: {input_text}
Output:
`,

  continueExtraction:
    'MANY entities were missed in the last extraction. Add them below using the same format:\n',

  ifLoopExtraction:
    'It appears some entities may have still been missed. Answer YES | NO if there are still entities that need to be added.\n',

  summarizeDescriptions: `You are a helpful assistant responsible for generating a comprehensive summary of the data provided below.
Given one or two entities, and a list of descriptions, all related to the same entity or group of entities, concatenate all of these into a single, comprehensive description. Make sure to include information collected from all the descriptions.
If the provided descriptions are contradictory, resolve the contradictions and provide a single, coherent summary.
Write in third person, and include the entity names so we have the full context.

#######
-Data-
Entities: {entity_name}
Description List: {description_list}
#######
Output:
`,

  communityReport: `You are an AI assistant that helps a human analyst to perform general information discovery about a community of entities in a knowledge graph.

# Goal
Write a comprehensive report of a community, given the entities that belong to it, their relationships, and optional reports of its sub-communities. The report informs decision-makers about the community's key entities, their relations and their significance.

# Report Structure
Return a well-formed JSON object with these fields:
- title: short, specific name of the community that mentions representative entities
- summary: executive summary of the community's overall structure and how its entities relate
- rating: a float between 0 and 10 for the IMPACT of the entities within the community
- rating_explanation: a single sentence explaining the rating
- findings: a list of 5-10 objects, each with a "summary" and an "explanation" field

Return output as:
{
  "title": <report_title>,
  "summary": <executive_summary>,
  "rating": <impact_severity_rating>,
  "rating_explanation": <rating_explanation>,
  "findings": [{"summary": <insight_summary>, "explanation": <insight_explanation>}]
}

# Real Data
Use the following text for your answer. Do not make anything up.

Text:
{input_text}

Output:
`,

  localRagResponse: `---Role---

You are a helpful assistant responding to questions about data in the tables provided.

---Goal---

Generate a response of the target length and format that responds to the user's question, summarizing all information in the input data tables appropriate for the response length and format, and incorporating any relevant general knowledge.
If you don't know the answer, just say so. Do not make anything up.
Do not include information where the supporting evidence for it is not provided.

---Target response length and format---

{response_type}

---Data tables---

{context_data}

Add sections and commentary to the response as appropriate for the length and format. Style the response in markdown.
`,

  naiveRagResponse: `You're a helpful assistant.
Below is the knowledge you know:
{content_data}
---
If you don't know the answer or if the provided knowledge does not contain sufficient information to provide an answer, just say so. Do not make anything up.
Generate a response of the target length and format that responds to the user's question, summarizing all information appropriate for the response length and format, and incorporating any relevant general knowledge.
---Target response length and format---
{response_type}
`,
} as const;

export type PromptName = keyof typeof PROMPTS;
