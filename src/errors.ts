export function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message || error.name;
  return String(error) || 'Unknown error';
}
