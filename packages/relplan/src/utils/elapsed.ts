/**
 * Render an elapsed time in nanoseconds as `[Nd ][Nh ][Nm ] S.SSSSSSs`.
 * Leading units are omitted while zero; the seconds part always keeps its
 * leading space.
 */
export function formatElapsed(nanos: number): string {
  const totalSeconds = nanos / 1_000_000_000
  const minutesTotal = Math.floor(totalSeconds / 60)
  const seconds = totalSeconds - minutesTotal * 60
  const hoursTotal = Math.floor(minutesTotal / 60)
  const minutes = minutesTotal - hoursTotal * 60
  const days = Math.floor(hoursTotal / 24)
  const hours = hoursTotal - days * 24

  let text = ` ${seconds.toFixed(6)}s`
  if (minutes) text = `${minutes}m ${text}`
  if (hours) text = `${hours}h ${text}`
  if (days) text = `${days}d ${text}`
  return text
}
