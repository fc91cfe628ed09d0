import { SynthesisError, describeError } from "../errors.js";
import type { NarrationAudio, SpeechSynthesizer } from "./SpeechSynthesizer.js";
import { cleanForSpeech, splitForSpeech } from "./text.js";

const SYNTHESIZE_URL = "https://texttospeech.googleapis.com/v1/text:synthesize";

interface SynthesizeResponse {
  audioContent?: string;
}

export class GoogleSpeechSynthesizer implements SpeechSynthesizer {
  private readonly languageCode: string;

  constructor(
    private readonly apiKey: string,
    private readonly voice: string
  ) {
    // Voice names start with their language, e.g. en-GB-Neural2-C.
    this.languageCode = voice.split("-").slice(0, 2).join("-");
  }

  private async synthesizeChunk(text: string): Promise<Buffer> {
    let response: Response;
    try {
      response = await fetch(SYNTHESIZE_URL, {
        method: "POST",
        headers: {
          "Content-Type": "application/json",
          "x-goog-api-key": this.apiKey
        },
        body: JSON.stringify({
          input: { text },
          voice: { languageCode: this.languageCode, name: this.voice },
          audioConfig: { audioEncoding: "MP3" }
        })
      });
    } catch (error) {
      throw new SynthesisError(`Speech request failed: ${describeError(error)}`, { cause: error });
    }

    if (!response.ok) {
      throw new SynthesisError(`Speech request failed with status ${response.status}`);
    }

    const payload = (await response.json().catch(() => ({}))) as SynthesizeResponse;
    const audio = Buffer.from(payload.audioContent ?? "", "base64");
    if (audio.length === 0) {
      throw new SynthesisError("Speech service returned no audio");
    }
    return audio;
  }

  async synthesize(text: string): Promise<NarrationAudio> {
    const chunks = splitForSpeech(cleanForSpeech(text));
    if (chunks.length === 0) {
      throw new SynthesisError("Nothing to narrate");
    }

    // MP3 frames are self-contained, so the pieces play back as one track.
    const parts: Buffer[] = [];
    for (const chunk of chunks) {
      parts.push(await this.synthesizeChunk(chunk));
    }
    return { bytes: Buffer.concat(parts), mimeType: "audio/mpeg" };
  }
}
