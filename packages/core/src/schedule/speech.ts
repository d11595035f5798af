/**
 * Speech-to-text seam. Capture and recognition live outside this project;
 * a provider only has to hand back the recognised text.
 */

export interface SpeechToText {
  readonly id: string

  /** Recognised text, or null when nothing could be captured */
  transcribe(): Promise<string | null>
}

/** Provider for environments without a microphone */
export class UnavailableSpeechToText implements SpeechToText {
  readonly id = 'unavailable'

  async transcribe(): Promise<string | null> {
    return null
  }
}
