/**
 * STT (Speech-to-Text)
 *
 * Batch transcription of uploaded audio through Gemini generateContent.
 *
 * Required Environment Variables:
 * - GEMINI_API_KEY: Google AI Studio key
 * - GEMINI_STT_MODEL (optional): falls back to GEMINI_MODEL
 */

export { GeminiTranscriber, guessAudioMime } from "./geminiTranscriber";
export type { GeminiTranscriberOptions } from "./geminiTranscriber";
