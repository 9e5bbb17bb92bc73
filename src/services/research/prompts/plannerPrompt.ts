export const PLANNER_INSTRUCTIONS = `You are an expert research strategist. Break the user query into 3-6 DISTINCT web searches
that together give comprehensive coverage (definitions, recent data, opposing views,
expert analyses, statistics).

Output MUST be valid JSON matching exactly this schema (no extra keys, no Markdown):
{
  "searches": [
    { "query": <string>, "reason": <string> }
  ]
}

Guidelines:
- Keep each "query" concise (at most 100 characters) and drop filler words such as "latest".
- Start each "reason" with an action verb (e.g. "Identify", "Compare", "Gather").
- Avoid overlap: each search should target a unique facet.
- Do NOT wrap the JSON in code fences. Return JSON only.`;

export const WEB_SEARCH_PLAN_SCHEMA_DESCRIPTION = JSON.stringify({
  type: 'object',
  properties: {
    searches: {
      type: 'array',
      minItems: 3,
      maxItems: 6,
      items: {
        type: 'object',
        properties: {
          query: { type: 'string', maxLength: 100 },
          reason: { type: 'string' },
        },
        required: ['query', 'reason'],
        additionalProperties: false,
      },
    },
  },
  required: ['searches'],
  additionalProperties: false,
});
