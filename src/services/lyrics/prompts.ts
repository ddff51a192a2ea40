import { ADULT_VIBES, ADULT_VOICES, describeTag, KID_OCCASIONS, KID_VIBES, KID_VOICES } from './constants';
import type { AdultLyricsRequest, KidLyricsRequest, LyricsPrompt } from './types';

const OUTPUT_RULE = 'Do NOT use markdown formatting like **bold** or bullet points.';

export function buildKidLyricsPrompt(request: KidLyricsRequest): LyricsPrompt {
  const { childName, theme, occasion } = request;
  const user = [
    `Write original, kid-safe song lyrics for a child named ${childName}.`,
    '',
    `Theme: ${theme}`,
    `Occasion: ${occasion}`,
    `Occasion description: ${describeTag(KID_OCCASIONS, occasion)}`,
    `Vibe: ${describeTag(KID_VIBES, request.vibe)}`,
    `Voice hint: ${describeTag(KID_VOICES, request.voiceType)}`,
    '',
    'Guidelines:',
    '- Age target: roughly 3-8 years old.',
    '- Keep language very simple and positive.',
    '- Make it easy to sing along.',
    `- Include the child's name ${childName} several times, especially in the chorus.`,
    '- Do NOT mention AI, technology, or that this is generated.',
    '- Avoid anything scary, violent, mean, or romantic.',
    '',
    'Structure:',
    '- 1 short verse',
    '- 1 very catchy chorus',
    '- 1 more short verse',
    '- Repeat the chorus at the end.',
    '',
    'Output format:',
    'Write plain lyrics with labeled sections like:',
    'Verse 1:',
    '...',
    'Chorus:',
    '...',
    'Verse 2:',
    '...',
    'Chorus:',
    '...',
    '',
    OUTPUT_RULE,
  ].join('\n');

  return {
    system: "You are a professional children's songwriter. You write short, catchy, age-appropriate lyrics for kids.",
    user,
    temperature: 0.9,
    maxTokens: 400,
  };
}

export function buildAdultLyricsPrompt(request: AdultLyricsRequest): LyricsPrompt {
  const { recipientName, genre } = request;
  const vibe = describeTag(ADULT_VIBES, request.vibe);
  const user = [
    'Write original song lyrics for an adult listener.',
    '',
    `Recipient: ${recipientName}`,
    `Relationship to the singer: ${request.relationship}`,
    `Occasion: ${request.occasion}`,
    `Genre: ${genre}`,
    `Vibe: ${vibe}`,
    `Voice hint: ${describeTag(ADULT_VOICES, request.voiceType)}`,
    '',
    'Details to weave into the song:',
    request.storyOrDetails,
    '',
    'Guidelines:',
    `- Make this feel personal to ${recipientName}.`,
    '- Include their name several times, especially in the chorus.',
    `- Lean into the tone: ${vibe}.`,
    "- Avoid explicit content, slurs, or cruel insults. Gentle roasting is OK if 'roast' or 'funny' is implied, but keep it light and affectionate.",
    '- Do NOT mention AI, technology, or that this is generated.',
    `- Keep it in a modern, singable style appropriate for a ${genre} track.`,
    '',
    'Structure:',
    '- Short intro line (optional)',
    '- Verse 1',
    '- Chorus (big, memorable hook)',
    '- Verse 2',
    '- Chorus (slightly varied or repeated)',
    '- Optional short bridge (2-4 lines)',
    '- Final chorus',
    '',
    'Output format:',
    'Write plain lyrics with labeled sections like:',
    'Intro:',
    '...',
    'Verse 1:',
    '...',
    'Chorus:',
    '...',
    'etc.',
    '',
    OUTPUT_RULE,
  ].join('\n');

  return {
    system:
      'You are a professional pop songwriter who writes custom songs for people. ' +
      'You focus on clear hooks, emotional impact, and singable, modern phrasing.',
    user,
    temperature: 0.95,
    maxTokens: 600,
  };
}

export function buildKidStylePrompt(request: Pick<KidLyricsRequest, 'childName' | 'theme' | 'occasion'>): string {
  return `Song for ${request.childName}. Theme: ${request.theme}. Occasion: ${request.occasion}. Fun, playful kids music.`;
}

export function buildAdultStylePrompt(
  request: Pick<AdultLyricsRequest, 'recipientName' | 'relationship' | 'occasion' | 'genre' | 'vibe'>,
): string {
  return (
    `Song for ${request.recipientName} (${request.relationship}). ` +
    `Occasion: ${request.occasion}. Genre: ${request.genre}. Vibe: ${request.vibe}.`
  );
}
