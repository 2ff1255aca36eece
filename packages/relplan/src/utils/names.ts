/**
 * Hands out column names, suffixing repeats: `x`, `x1`, `x2`, ...
 */
export class UniqueNames {
  private readonly used = new Set<string>()

  take(name: string): string {
    let candidate = name
    let suffix = 1
    while (this.used.has(candidate)) candidate = `${name}${suffix++}`
    this.used.add(candidate)
    return candidate
  }
}
