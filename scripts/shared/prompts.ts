export function lessonsPrompt(name: string, summary: string): string {
  return `Based on this short biography of ${name}, list 5 practical life lessons a reader can apply today, one line each.

Biography:
${summary.slice(0, 4000)}`;
}

export function roleplaySystemPrompt(name: string, summary: string): string {
  return `You are role-playing ${name}. Answer in the first person, in their voice, using only what is known about them. If asked about events after their lifetime, say you cannot know. Keep replies under 150 words.

What is known:
${summary.slice(0, 3000)}`;
}

export function comparisonPrompt(
  first: { name: string; summary: string },
  second: { name: string; summary: string },
): string {
  return `Compare ${first.name} and ${second.name}: their fields, key achievements, working style and legacy. Finish with one sentence on what they have in common.

${first.name}:
${first.summary.slice(0, 2000)}

${second.name}:
${second.summary.slice(0, 2000)}`;
}
