import ffmpeg from 'fluent-ffmpeg';
import fs from 'fs';
import path from 'path';
import { PassThrough, Readable } from 'stream';
import { logger } from '../../config/logger';
import { AudioCodecError, describeError } from '../../utils/errors';
import { AudioSegment, DEFAULT_PCM_FORMAT } from './audio-segment';
import type { PcmFormat } from './audio-segment';

/** Decodes backend payloads into segments and writes finished tracks. */
export interface AudioCodec {
  /**
   * Decode encoded audio bytes. `pcmFormat` describes headerless PCM and is
   * required when `format` is `pcm`.
   */
  decode(bytes: Buffer, format: string, pcmFormat?: PcmFormat): Promise<AudioSegment>;

  /** Encode a segment to `outputPath`. Returns the path written. */
  encodeToFile(segment: AudioSegment, outputPath: string, format: string): Promise<string>;
}

export function isRawPcm(format: string): boolean {
  return format.toLowerCase() === 'pcm';
}

/** ffmpeg demuxer name for a container/extension, when it cannot be left to probing. */
function demuxerFor(format: string): string | undefined {
  switch (format.toLowerCase()) {
    case 'mp3': return 'mp3';
    case 'wav': return 'wav';
    case 'flac': return 'flac';
    case 'aac': return 'aac';
    case 'ogg':
    case 'opus': return 'ogg';
    default: return undefined;
  }
}

/**
 * FFmpeg-backed codec. Compressed formats are decoded by piping the bytes
 * through ffmpeg into s16le PCM at `targetFormat`; raw PCM never leaves the process.
 */
export class FfmpegAudioCodec implements AudioCodec {
  constructor(private readonly targetFormat: PcmFormat = DEFAULT_PCM_FORMAT) {}

  async decode(bytes: Buffer, format: string, pcmFormat?: PcmFormat): Promise<AudioSegment> {
    if (bytes.length === 0) {
      throw new AudioCodecError(`Cannot decode an empty ${format} payload`);
    }

    if (isRawPcm(format)) {
      if (!pcmFormat) {
        throw new AudioCodecError('Raw PCM payload needs an explicit sample rate and channel count');
      }
      return AudioSegment.fromPcm(bytes, pcmFormat);
    }

    return new Promise<AudioSegment>((resolve, reject) => {
      const chunks: Buffer[] = [];
      const output = new PassThrough();
      let failed = false;

      output.on('data', (chunk: Buffer) => chunks.push(chunk));
      output.on('end', () => {
        if (failed) return;
        try {
          resolve(AudioSegment.fromPcm(Buffer.concat(chunks), this.targetFormat));
        } catch (error) {
          reject(error);
        }
      });

      const command = ffmpeg(Readable.from([bytes]));
      const demuxer = demuxerFor(format);
      if (demuxer) {
        command.inputFormat(demuxer);
      }

      command
        .noVideo()
        .audioCodec('pcm_s16le')
        .audioFrequency(this.targetFormat.frameRate)
        .audioChannels(this.targetFormat.channels)
        .format('s16le')
        .on('error', (err: unknown) => {
          failed = true;
          const msg = describeError(err);
          logger.error('FFmpeg decode error: %s', msg);
          reject(new AudioCodecError(`Failed to decode ${format} audio: ${msg}`, { cause: err }));
        });

      command.pipe(output, { end: true });
    });
  }

  async encodeToFile(segment: AudioSegment, outputPath: string, format: string): Promise<string> {
    fs.mkdirSync(path.dirname(outputPath), { recursive: true });

    if (isRawPcm(format)) {
      await fs.promises.writeFile(outputPath, segment.toPcm());
      logger.info(`Raw PCM written: ${outputPath}`);
      return outputPath;
    }

    return new Promise<string>((resolve, reject) => {
      const command = ffmpeg(Readable.from([segment.toPcm()]))
        .inputFormat('s16le')
        .inputOptions([
          '-ar', String(segment.frameRate),
          '-ac', String(segment.channels),
        ]);

      this.setOutputOptions(command, format, segment);
      command.output(outputPath);

      command
        .on('end', () => {
          logger.info(`Audio encoded: ${outputPath}`, {
            format,
            durationMs: Math.round(segment.durationMs),
          });
          resolve(outputPath);
        })
        .on('error', (err: unknown) => {
          const msg = describeError(err);
          logger.error('FFmpeg encode error: %s', msg);
          reject(new AudioCodecError(`Failed to encode ${format} audio: ${msg}`, { cause: err }));
        });

      command.run();
    });
  }

  /**
   * Set output options based on format
   */
  private setOutputOptions(command: ffmpeg.FfmpegCommand, format: string, segment: AudioSegment): void {
    switch (format.toLowerCase()) {
      case 'mp3':
        command
          .audioCodec('libmp3lame')
          .audioBitrate('192k')
          .audioChannels(segment.channels)
          .audioFrequency(segment.frameRate);
        break;
      case 'wav':
        command
          .audioCodec('pcm_s16le')
          .audioChannels(segment.channels)
          .audioFrequency(segment.frameRate);
        break;
      case 'flac':
        command.audioCodec('flac');
        break;
      case 'aac':
        command
          .audioCodec('aac')
          .audioBitrate('192k')
          .format('adts');
        break;
      case 'ogg':
      case 'opus':
        command
          .audioCodec('libopus')
          .audioFrequency(48000)
          .format('ogg');
        break;
      default:
        throw new AudioCodecError(`Unsupported output format "${format}"`);
    }
  }
}
