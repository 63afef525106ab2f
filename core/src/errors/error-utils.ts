export function formatErrorMessage(error: unknown): string {
  if (error instanceof AggregateError) {
    return `${error.message}: ${error.errors.map((e) => formatErrorMessage(e)).join("; ")}`
  }
  if (error instanceof Error) {
    return error.cause instanceof Error && !error.message.includes(error.cause.message)
      ? `${error.message} (caused by: ${formatErrorMessage(error.cause)})`
      : error.message
  }
  return String(error)
}
