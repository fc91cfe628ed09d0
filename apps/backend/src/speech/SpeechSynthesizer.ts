export interface NarrationAudio {
  bytes: Uint8Array;
  mimeType: "audio/mpeg";
}

export interface SpeechSynthesizer {
  synthesize(text: string): Promise<NarrationAudio>;
}
