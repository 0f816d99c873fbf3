const BRACKETED_NON_SPEECH =
  /^[[(](music|applause|laughter|laughs|silence|noise|inaudible|crosstalk|pause|coughs?)[\])]$/i;
const MUSICAL_NON_SPEECH = /^♪.*♪$/u;
const SYMBOL_ONLY = /^(♪+|\.{3}|\*{3}|-{2})$/u;

export function isNonSpeechTokenText(text: string): boolean {
  const lines = text
    .split('\n')
    .map((line) => line.trim())
    .filter(Boolean);
  if (lines.length === 0) {
    return false;
  }

  return lines.every(
    (line) =>
      BRACKETED_NON_SPEECH.test(line) || MUSICAL_NON_SPEECH.test(line) || SYMBOL_ONLY.test(line)
  );
}
