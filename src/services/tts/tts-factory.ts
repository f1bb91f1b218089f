import type { ProviderSettings } from '../../config/app-config';
import { ElevenLabsProvider } from './elevenlabs-provider';
import { GoogleTTSProvider } from './google-provider';
import { OpenAIProvider } from './openai-provider';
import type { SynthesisBackend } from './tts-provider.interface';

/** Instantiate the backend adapter named by the configuration. */
export function createSynthesisBackend(selection: ProviderSettings): SynthesisBackend {
  switch (selection.provider) {
    case 'openai':
      return new OpenAIProvider(selection.settings);
    case 'elevenlabs':
      return new ElevenLabsProvider(selection.settings);
    case 'google':
      return new GoogleTTSProvider(selection.settings);
  }
}
