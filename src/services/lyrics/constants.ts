export const FALLBACK_KEY = 'default';

/** Tone descriptions for kid songs, keyed by vibe tag. */
export const KID_VIBES: Readonly<Record<string, string>> = {
  sunny_kids: 'bright, upbeat, playful kids song with a catchy chorus',
  lullaby: 'gentle, soothing lullaby with calm, simple lines',
  pop_kids: 'modern, bouncy pop song for kids with a strong hook',
  party_kids: 'high-energy kids party song that makes you want to dance',
  [FALLBACK_KEY]: 'fun, melodic kids song',
};

export const KID_VOICES: Readonly<Record<string, string>> = {
  male: 'Imagine a friendly dad / big brother style voice.',
  female: 'Imagine a warm mom / big sister style voice.',
  child: 'Imagine a natural, child-like singing voice (not squeaky).',
  [FALLBACK_KEY]: 'Use a neutral, friendly singing voice.',
};

export const KID_OCCASIONS: Readonly<Record<string, string>> = {
  everyday: 'This is for everyday listening, a fun surprise for the child.',
  birthday: "This is for their birthday. Mention celebration and turning a new age (but don't guess the exact age).",
  holiday: 'This is for a holiday. Make it cozy and festive, without naming specific religious details.',
  milestone: 'This is for a big milestone like school, sports, or learning something new.',
  custom: 'This is for a special custom moment chosen by the parent.',
  [FALLBACK_KEY]: 'This is a fun song they can enjoy any day.',
};

export const ADULT_VIBES: Readonly<Record<string, string>> = {
  fun: 'fun, upbeat, playful, light-hearted',
  heartfelt: 'emotional, sincere, warm, grateful',
  epic: 'big, cinematic, anthemic, inspiring',
  silly: 'very playful, comedic, goofy, roast-style but not cruel',
  romantic: 'tender, intimate, loving, romantic',
  [FALLBACK_KEY]: 'engaging and modern',
};

export const ADULT_VOICES: Readonly<Record<string, string>> = {
  male: 'Imagine a natural male pop singer performing this.',
  female: 'Imagine a natural female pop singer performing this.',
  [FALLBACK_KEY]: 'The vocal style is flexible, any expressive pop voice.',
};

/** Looks a tag up in one of the tables above, falling back to its default entry. */
export function describeTag(table: Readonly<Record<string, string>>, tag: string): string {
  const key = tag.trim().toLowerCase();
  if (key !== FALLBACK_KEY && Object.hasOwn(table, key)) {
    return table[key];
  }
  return table[FALLBACK_KEY];
}
