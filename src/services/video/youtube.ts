/**
 * YouTube Source Adapter
 *
 * Turns a YouTube URL into an ExtractedDocument the metadata extractors can
 * consume: video info from the Data API v3, a transcript from the public
 * caption tracks of the watch page, and the description when no transcript
 * exists.
 *
 * @module services/video/youtube
 */

import { z } from 'zod';
import { PipelineError } from '../../core/errors.js';
import type { ExtractedDocument } from '../../models/document.js';
import { withDeadline } from '../../utils/deadline.js';
import type { Logger } from '../../utils/logger.js';
import { formatZodIssues } from '../../utils/validation.js';

// ═══════════════════════════════════════════════════════════════════════════════
// CONSTANTS
// ═══════════════════════════════════════════════════════════════════════════════

export const VIDEO_MIME_TYPE = 'video/youtube';
export const DEFAULT_TRANSCRIPT_LANGUAGES: readonly string[] = ['ko', 'en'];

const DATA_API_BASE = 'https://www.googleapis.com/youtube/v3';
const WATCH_BASE = 'https://www.youtube.com/watch';
const DEFAULT_REQUEST_TIMEOUT_MS = 30_000;

const VIDEO_ID_PATTERN = /^[A-Za-z0-9_-]{11}$/;
const WATCH_HOSTS = new Set(['www.youtube.com', 'youtube.com', 'm.youtube.com', 'music.youtube.com']);
const PATH_PREFIXES = ['/embed/', '/v/', '/shorts/', '/live/'];

// ═══════════════════════════════════════════════════════════════════════════════
// TYPES
// ═══════════════════════════════════════════════════════════════════════════════

export interface VideoInfo {
  videoId: string;
  title: string;
  description: string;
  channel: string;
  publishedAt: string;
  defaultLanguage: string | null;
  defaultAudioLanguage: string | null;
  /** ISO 8601 duration, e.g. PT4M13S */
  duration: string | null;
}

export interface CaptionSummary {
  language: string;
  trackKind: string;
  name: string;
}

export type TranscriptKind = 'manual' | 'asr';

export interface Transcript {
  languageCode: string;
  kind: TranscriptKind;
  text: string;
}

export interface LoadedVideo {
  document: ExtractedDocument;
  info: VideoInfo;
  /** Where the body under [Transcript] came from */
  transcriptSource: 'transcript' | 'description';
  transcript: Transcript | null;
}

export interface YouTubeSourceOptions {
  apiKey: string;
  /** Preference order for transcript languages */
  languages?: readonly string[];
  requestTimeoutMs?: number;
  fetchImpl?: typeof fetch;
}

// ═══════════════════════════════════════════════════════════════════════════════
// RESPONSE SCHEMAS
// ═══════════════════════════════════════════════════════════════════════════════

const VideosListSchema = z.object({
  items: z
    .array(
      z.object({
        id: z.string(),
        snippet: z.object({
          title: z.string().default(''),
          description: z.string().default(''),
          channelTitle: z.string().default(''),
          publishedAt: z.string().default(''),
          defaultLanguage: z.string().optional(),
          defaultAudioLanguage: z.string().optional(),
        }),
        contentDetails: z.object({ duration: z.string().optional() }).optional(),
      })
    )
    .default([]),
});

const CaptionsListSchema = z.object({
  items: z
    .array(
      z.object({
        snippet: z.object({
          language: z.string(),
          trackKind: z.string().default('standard'),
          name: z.string().default(''),
        }),
      })
    )
    .default([]),
});

const CaptionTrackSchema = z.object({
  baseUrl: z.string().url(),
  languageCode: z.string(),
  kind: z.string().optional(),
});
const CaptionTracksSchema = z.array(CaptionTrackSchema);
export type CaptionTrack = z.infer<typeof CaptionTrackSchema>;

const TimedTextSchema = z.object({
  events: z
    .array(
      z.object({
        segs: z.array(z.object({ utf8: z.string().default('') })).optional(),
      })
    )
    .default([]),
});

// ═══════════════════════════════════════════════════════════════════════════════
// URL PARSING
// ═══════════════════════════════════════════════════════════════════════════════

function videoSourceError(message: string, details: Record<string, unknown>, cause?: unknown): PipelineError {
  return new PipelineError('VIDEO_SOURCE_FAILED', message, details, cause === undefined ? undefined : { cause });
}

/**
 * Extract the 11-character video id from a watch, short-link, embed,
 * legacy /v/, shorts or live URL.
 */
export function extractVideoId(url: string): string {
  let parsed: URL;
  try {
    parsed = new URL(url.trim());
  } catch (error) {
    throw videoSourceError(`Cannot extract video ID from URL: ${url}`, { url }, error);
  }

  const host = parsed.hostname.toLowerCase();
  let candidate = '';
  if (host === 'youtu.be') {
    candidate = parsed.pathname.slice(1).split('/')[0] ?? '';
  } else if (WATCH_HOSTS.has(host)) {
    if (parsed.pathname === '/watch') {
      candidate = parsed.searchParams.get('v') ?? '';
    } else {
      const prefix = PATH_PREFIXES.find((p) => parsed.pathname.startsWith(p));
      if (prefix) candidate = parsed.pathname.slice(prefix.length).split('/')[0] ?? '';
    }
  }

  if (!VIDEO_ID_PATTERN.test(candidate)) {
    throw videoSourceError(`Cannot extract video ID from URL: ${url}`, { url });
  }
  return candidate;
}

export function watchUrl(videoId: string): string {
  return `${WATCH_BASE}?v=${videoId}`;
}

/**
 * Slice the JSON array that follows `"captionTracks":` in a watch page.
 * Returns null when the page carries no caption tracks.
 */
export function findCaptionTracksJson(html: string): string | null {
  const marker = '"captionTracks":';
  const at = html.indexOf(marker);
  if (at === -1) return null;

  const start = html.indexOf('[', at + marker.length);
  if (start === -1) return null;

  let depth = 0;
  let inString = false;
  for (let i = start; i < html.length; i++) {
    const ch = html[i];
    if (inString) {
      if (ch === '\\') i++;
      else if (ch === '"') inString = false;
      continue;
    }
    if (ch === '"') inString = true;
    else if (ch === '[' || ch === '{') depth++;
    else if (ch === ']' || ch === '}') {
      depth--;
      if (depth === 0) return html.slice(start, i + 1);
    }
  }
  return null;
}

/**
 * Pick a track by language preference; for each language a manual track
 * beats an auto-generated (asr) one.
 */
export function selectCaptionTrack(
  tracks: readonly CaptionTrack[],
  languages: readonly string[]
): CaptionTrack | null {
  const matches = (track: CaptionTrack, lang: string) => {
    const code = track.languageCode.toLowerCase();
    const wanted = lang.toLowerCase();
    return code === wanted || code.startsWith(`${wanted}-`);
  };

  for (const lang of languages) {
    const manual = tracks.find((t) => t.kind !== 'asr' && matches(t, lang));
    if (manual) return manual;
    const generated = tracks.find((t) => t.kind === 'asr' && matches(t, lang));
    if (generated) return generated;
  }
  return null;
}

/**
 * Flatten json3 timed text into one line per caption event
 */
export function timedTextToPlainText(payload: unknown): string {
  const parsed = TimedTextSchema.parse(payload);
  return parsed.events
    .map((event) =>
      (event.segs ?? [])
        .map((seg) => seg.utf8)
        .join('')
        .replace(/\s+/g, ' ')
        .trim()
    )
    .filter((line) => line.length > 0)
    .join('\n');
}

export function buildVideoFullText(info: VideoInfo, body: string): string {
  return (
    `[Video Title] ${info.title}\n` +
    `[Channel] ${info.channel}\n` +
    `[Published] ${info.publishedAt}\n\n` +
    `[Transcript]\n${body}`
  );
}

// ═══════════════════════════════════════════════════════════════════════════════
// SOURCE
// ═══════════════════════════════════════════════════════════════════════════════

export class YouTubeSource {
  private readonly apiKey: string;
  private readonly languages: readonly string[];
  private readonly timeoutMs: number;
  private readonly fetchImpl: typeof fetch;

  constructor(
    options: YouTubeSourceOptions,
    private readonly logger: Logger
  ) {
    if (!options.apiKey) {
      throw new PipelineError('CONFIGURATION_INVALID', 'YOUTUBE_API_KEY is required for video mode');
    }
    this.apiKey = options.apiKey;
    this.languages = options.languages?.length ? options.languages : DEFAULT_TRANSCRIPT_LANGUAGES;
    this.timeoutMs = options.requestTimeoutMs ?? DEFAULT_REQUEST_TIMEOUT_MS;
    this.fetchImpl = options.fetchImpl ?? fetch;
  }

  async getVideoInfo(videoId: string, signal?: AbortSignal): Promise<VideoInfo> {
    this.logger.info(`Fetching video info for ${videoId}`);
    const url = `${DATA_API_BASE}/videos?part=snippet,contentDetails&id=${encodeURIComponent(videoId)}&key=${encodeURIComponent(this.apiKey)}`;
    const body = await this.getJson(url, 'videos.list', signal);

    const parsed = VideosListSchema.safeParse(body);
    if (!parsed.success) {
      throw videoSourceError('Unexpected videos.list response', {
        videoId,
        issues: formatZodIssues(parsed.error),
      });
    }

    const item = parsed.data.items[0];
    if (!item) {
      throw videoSourceError(`Video not found: ${videoId}`, { videoId });
    }

    const { snippet } = item;
    return {
      videoId,
      title: snippet.title,
      description: snippet.description,
      channel: snippet.channelTitle,
      publishedAt: snippet.publishedAt,
      defaultLanguage: snippet.defaultLanguage ?? null,
      defaultAudioLanguage: snippet.defaultAudioLanguage ?? null,
      duration: item.contentDetails?.duration ?? null,
    };
  }

  /**
   * Caption tracks the Data API lists. Informational only: downloading
   * them through the API needs OAuth, so failures are logged and ignored.
   */
  async listCaptions(videoId: string, signal?: AbortSignal): Promise<CaptionSummary[]> {
    this.logger.info(`Listing captions for ${videoId}`);
    const url = `${DATA_API_BASE}/captions?part=snippet&videoId=${encodeURIComponent(videoId)}&key=${encodeURIComponent(this.apiKey)}`;
    try {
      const body = await this.getJson(url, 'captions.list', signal);
      return CaptionsListSchema.parse(body).items.map((item) => item.snippet);
    } catch (error) {
      if (signal?.aborted) throw error;
      this.logger.warn(`captions.list failed for ${videoId}: ${error instanceof Error ? error.message : String(error)}`);
      return [];
    }
  }

  /**
   * Public transcript in the preferred language, or null when none exists
   * or it cannot be fetched.
   */
  async getTranscript(videoId: string, signal?: AbortSignal): Promise<Transcript | null> {
    this.logger.info(`Fetching transcript for ${videoId} (languages=${this.languages.join(',')})`);
    try {
      const html = await this.getText(`${watchUrl(videoId)}&hl=en`, 'watch page', signal);
      const tracksJson = findCaptionTracksJson(html);
      if (!tracksJson) {
        this.logger.warn(`No caption tracks published for ${videoId}`);
        return null;
      }

      const tracks = CaptionTracksSchema.parse(JSON.parse(tracksJson));
      const track = selectCaptionTrack(tracks, this.languages);
      if (!track) {
        const available = tracks.map((t) => `${t.languageCode}${t.kind === 'asr' ? ' (auto)' : ''}`).join(', ');
        this.logger.warn(`No transcript in ${this.languages.join(',')} for ${videoId}; available: ${available || 'none'}`);
        return null;
      }

      const timedText = await this.getJson(`${track.baseUrl}&fmt=json3`, 'timedtext', signal);
      const text = timedTextToPlainText(timedText);
      if (!text) return null;

      const kind: TranscriptKind = track.kind === 'asr' ? 'asr' : 'manual';
      this.logger.debug(`Transcript ${track.languageCode} (${kind}): ${text.length} chars`);
      return { languageCode: track.languageCode, kind, text };
    } catch (error) {
      if (signal?.aborted) throw error;
      this.logger.warn(`Failed to fetch transcript: ${error instanceof Error ? error.message : String(error)}`);
      return null;
    }
  }

  /**
   * Resolve a URL into a single-page document ready for metadata extraction
   */
  async load(url: string, signal?: AbortSignal): Promise<LoadedVideo> {
    const videoId = extractVideoId(url);
    this.logger.info(`Processing video: ${videoId} (${url})`);

    const info = await this.getVideoInfo(videoId, signal);
    this.logger.info(`Video title: ${info.title}`);

    const captions = await this.listCaptions(videoId, signal);
    this.logger.debug(`Caption tracks listed: ${captions.map((c) => `${c.language}/${c.trackKind}`).join(', ') || 'none'}`);

    const transcript = await this.getTranscript(videoId, signal);
    if (!transcript) {
      this.logger.warn('No transcript available; using video description as fallback');
    }

    const fullText = buildVideoFullText(info, transcript?.text ?? info.description);
    return {
      document: {
        fullText,
        pages: [{ pageNumber: 1, text: fullText }],
        entities: [],
        sourceUri: watchUrl(videoId),
        mimeType: VIDEO_MIME_TYPE,
      },
      info,
      transcriptSource: transcript ? 'transcript' : 'description',
      transcript,
    };
  }

  // ─────────────────────────────────────────────────────────────────────────────
  // HTTP
  // ─────────────────────────────────────────────────────────────────────────────

  private async request(url: string, label: string, signal?: AbortSignal): Promise<Response> {
    let response: Response;
    try {
      response = await withDeadline((inner) => this.fetchImpl(url, { signal: inner }), this.timeoutMs, { signal });
    } catch (error) {
      if (error instanceof PipelineError) throw error;
      throw videoSourceError(
        `${label} request failed: ${error instanceof Error ? error.message : String(error)}`,
        { request: label },
        error
      );
    }

    if (!response.ok) {
      throw videoSourceError(`${label} returned HTTP ${response.status}`, { request: label, status: response.status });
    }
    return response;
  }

  private async getJson(url: string, label: string, signal?: AbortSignal): Promise<unknown> {
    const response = await this.request(url, label, signal);
    try {
      const body: unknown = await response.json();
      return body;
    } catch (error) {
      throw videoSourceError(`${label} returned invalid JSON`, { request: label }, error);
    }
  }

  private async getText(url: string, label: string, signal?: AbortSignal): Promise<string> {
    const response = await this.request(url, label, signal);
    return response.text();
  }
}
