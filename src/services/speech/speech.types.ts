/**
 * Speech ports
 * Microphone permission, audio capture and streaming recognition.
 */

export type SpeechCaptureState = 'idle' | 'awaitingPermission' | 'recording' | 'finalizing';

export type SpeechPermissionStatus = 'granted' | 'denied';

export interface SpeechPermissionProvider {
  /** Covers both microphone and speech-recognition authorization */
  requestPermission(): Promise<SpeechPermissionStatus>;
}

export interface AudioFrameBuffer {
  frameLength: number;
  channelData: Float32Array;
}

export interface AudioCaptureSession {
  installTap(bufferSize: number, onBuffer: (buffer: AudioFrameBuffer) => void): void;
  /** Begins delivering buffers to the tap; throws if the input can't start */
  start(): void;
  /** Stops the engine and removes the tap */
  stopTap(): void;
  /** Deactivates the platform audio session */
  release(): void;
}

export interface AudioCaptureProvider {
  /** Throws when the audio session can't be configured or activated */
  open(): AudioCaptureSession;
}

export type RecognitionEvent =
  | { type: 'partial'; transcript: string }
  | { type: 'final'; transcript: string }
  | { type: 'error'; error: Error };

export interface RecognitionTask {
  append(buffer: AudioFrameBuffer): void;
  /** Graceful finalize: the recognizer still emits a final event */
  endAudio(): void;
  /** Hard cancel: no further events */
  cancel(): void;
}

export interface RecognitionOptions {
  partialResults: boolean;
}

export interface SpeechRecognitionProvider {
  startTask(options: RecognitionOptions, onEvent: (event: RecognitionEvent) => void): RecognitionTask;
}

export type StartListeningResult =
  | 'started'
  | 'busy'
  | 'unavailable'
  | 'permission_denied'
  | 'capture_failed'
  | 'cancelled';

export type SpeechFailure =
  | { reason: 'unavailable' }
  | { reason: 'permission_denied'; error: PermissionDeniedError }
  | { reason: 'capture_failed'; error: Error }
  | { reason: 'recognition_error'; error: Error };

export class AudioCaptureError extends Error {
  constructor(message: string, cause?: unknown) {
    super(message, { cause });
    this.name = 'AudioCaptureError';
  }
}

export class PermissionDeniedError extends Error {
  constructor(public readonly resource: 'speech' | 'location') {
    super(`${resource} permission denied`);
    this.name = 'PermissionDeniedError';
  }
}
