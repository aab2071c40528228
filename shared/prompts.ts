export const SUMMARY_PROMPT_TEMPLATE = `You summarize news articles for a media-monitoring dashboard.

Write a neutral summary of the article text below in at most three sentences.
Keep names, places and figures exactly as written. Do not add opinions,
context that is not in the text, or a preamble. Reply with the summary only.

ARTICLE TEXT:
{{text}}`;

export const buildSummaryPrompt = (text: string): string => SUMMARY_PROMPT_TEMPLATE.replace('{{text}}', () => text);
