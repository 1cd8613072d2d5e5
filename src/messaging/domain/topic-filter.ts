/**
 * MQTT topic filter matching: `+` matches one level, a trailing `#` matches
 * the parent level and everything below it.
 *
 * @example
 * matchesTopicFilter('sensors/hall/temp', 'sensors/+/temp') // true
 * matchesTopicFilter('sensors', 'sensors/#') // true
 */
export function matchesTopicFilter(topic: string, filter: string): boolean {
  const filterLevels = filter.split('/')
  const topicLevels = topic.split('/')

  for (let i = 0; i < filterLevels.length; i++) {
    const level = filterLevels[i]

    if (level === '#') return i === filterLevels.length - 1
    if (i >= topicLevels.length) return false
    if (level !== '+' && level !== topicLevels[i]) return false
  }

  return filterLevels.length === topicLevels.length
}

/** `#` is only allowed as the whole last level, `+` only as a whole level. */
export function isValidTopicFilter(filter: string): boolean {
  if (filter === '') return false

  const levels = filter.split('/')
  return levels.every((level, i) => {
    if (level.includes('#')) return level === '#' && i === levels.length - 1
    if (level.includes('+')) return level === '+'
    return true
  })
}
