export function log(message: string, source = 'gom') {
  const formattedTime = new Date().toLocaleTimeString('en-US', {
    hour: 'numeric',
    minute: '2-digit',
    second: '2-digit',
    hour12: true,
  })

  console.log(`${formattedTime} [${source}] ${message}`)
}

export function logError(message: string, err: unknown, source = 'gom') {
  console.error(`[${source}] ${message}:`, err instanceof Error ? err.message : err)
}
