export class PayloadValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'PayloadValidationError';
  }
}

export function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export async function readJsonBody(request: Request): Promise<unknown> {
  try {
    return await request.json();
  } catch (error) {
    throw new PayloadValidationError(
      `Request body must be valid JSON${error instanceof SyntaxError ? '' : ` (${String(error)})`}.`
    );
  }
}

export function requireString(value: unknown, field: string): string {
  if (typeof value !== 'string') {
    throw new PayloadValidationError(`${field} is required and must be a string.`);
  }
  const trimmed = value.trim();
  if (!trimmed) {
    throw new PayloadValidationError(`${field} cannot be empty.`);
  }
  return trimmed;
}

export function requireLanguageList(value: unknown, field: string): string[] {
  if (!Array.isArray(value) || value.length === 0) {
    throw new PayloadValidationError(`${field} must be a non-empty array.`);
  }
  if (value.some((item) => typeof item !== 'string')) {
    throw new PayloadValidationError(`${field} must contain only strings.`);
  }
  const languages = [...new Set(value.map((item: string) => item.trim()).filter(Boolean))];
  if (languages.length === 0) {
    throw new PayloadValidationError(`${field} must contain at least one language.`);
  }
  return languages;
}
