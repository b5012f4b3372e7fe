/**
 * Ordered store of finalized segment texts
 */
export class TranscriptAccumulator {
  private segments: string[] = []

  append(text: string): void {
    if (text) {
      this.segments.push(text)
    }
  }

  /**
   * All finalized texts joined without a separator
   */
  fullText(): string {
    return this.segments.join('')
  }

  get segmentCount(): number {
    return this.segments.length
  }

  clear(): void {
    this.segments = []
  }
}
