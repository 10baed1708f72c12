export const PERSONA_PROMPT =
  'You are a tool that rates how well IT job offers fit a candidate. ' +
  'Return ONLY valid UTF-8 JSON, with no markdown and no explanation of your reasoning. ' +
  'Write all free text in Polish.';

export const OUTPUT_FORMAT_PROMPT = `Output exactly this JSON:
{ "ocena_oferty": <int 0-100>, "dopasowanie_kandydata": <int 0-100>, "techstack": ["...", "..."], "braki": ["...", "..."], "opinia": "at most 5 short sentences" }
ocena_oferty: overall quality of the offer; dopasowanie_kandydata: how well the candidate fits it.
techstack: 1-20 unique technologies named in the offer, lower case, normalized with the table below.
braki: requirements from the offer the candidate does not meet.`;

// Spelling variants folded to one canonical lower-case name
export const TECH_SYNONYMS: Record<string, string[]> = {
  'azure devops': ['azure devops pipelines', 'azure pipelines', 'ado pipelines', 'azure devops ci/cd'],
  'test automation': ['qa automation', 'sdet', 'automated testing'],
  'rest api': ['http api', 'web api'],
  'hil/sil': ['hardware-in-the-loop', 'software-in-the-loop'],
  python: ['python backend', 'python scripting'],
  'ci/cd': ['continuous integration', 'continuous delivery'],
  'github actions': ['gh actions', 'github actions'],
  'gitlab ci': ['gitlab-ci', 'gitlab ci/cd'],
  kubernetes: ['k8s', 'kubernetes'],
  azure: ['ms azure', 'azure cloud'],
  selenium: ['selenium webdriver'],
};

export function buildNormalizationPrompt(synonyms: Record<string, string[]> = TECH_SYNONYMS): string {
  const rules = Object.entries(synonyms).map(
    ([canonical, variants]) => `"${variants.join('|')}"→"${canonical}"`
  );
  return `Techstack normalization (always lower case): ${rules.join('; ')}.`;
}
