/**
 * SpeechCaptureService
 * Streams microphone audio into a recognizer and publishes finalized transcripts.
 *
 * States: idle → awaitingPermission → recording → (finalizing) → idle
 *
 * - One recognition task at a time. Starting a new capture cancels the previous
 *   task before asking for permission; events from a cancelled task are dropped.
 * - Partial transcripts replace currentTranscription and go nowhere else.
 * - stopListening() ends audio gracefully: the task stays attached until its
 *   final event, which is still published.
 * - Recognizer errors return to idle without publishing anything. No retries.
 */

import { BehaviorSubject, Subject, type Observable } from 'rxjs';
import { componentLogger } from '../../lib/logger/structured-logger.js';
import {
  AudioCaptureError,
  PermissionDeniedError,
  type AudioCaptureProvider,
  type AudioCaptureSession,
  type RecognitionEvent,
  type RecognitionTask,
  type SpeechCaptureState,
  type SpeechFailure,
  type SpeechPermissionProvider,
  type SpeechPermissionStatus,
  type SpeechRecognitionProvider,
  type StartListeningResult
} from './speech.types.js';

const log = componentLogger('SpeechCaptureService');

export const AUDIO_BUFFER_SIZE = 1024;

export interface SpeechCaptureDeps {
  permissions: SpeechPermissionProvider;
  audio: AudioCaptureProvider;
  recognizer: SpeechRecognitionProvider;
  voiceInputEnabled: boolean;
  bufferSize?: number;
}

export class SpeechCaptureService {
  private readonly _state = new BehaviorSubject<SpeechCaptureState>('idle');
  private readonly _transcription = new BehaviorSubject<string>('');
  private readonly _finalTranscripts = new Subject<string>();
  private readonly _failures = new Subject<SpeechFailure>();

  readonly state$: Observable<SpeechCaptureState> = this._state.asObservable();
  readonly currentTranscription$: Observable<string> = this._transcription.asObservable();
  readonly finalTranscripts$: Observable<string> = this._finalTranscripts.asObservable();
  readonly failures$: Observable<SpeechFailure> = this._failures.asObservable();

  private activeTask: RecognitionTask | null = null;
  private audioSession: AudioCaptureSession | null = null;
  private readonly bufferSize: number;

  constructor(private readonly deps: SpeechCaptureDeps) {
    this.bufferSize = deps.bufferSize ?? AUDIO_BUFFER_SIZE;
  }

  get state(): SpeechCaptureState {
    return this._state.getValue();
  }

  get currentTranscription(): string {
    return this._transcription.getValue();
  }

  get isAvailable(): boolean {
    return this.deps.voiceInputEnabled;
  }

  async startListening(): Promise<StartListeningResult> {
    if (!this.deps.voiceInputEnabled) {
      log.info('[SpeechCaptureService] voice input disabled');
      this._failures.next({ reason: 'unavailable' });
      return 'unavailable';
    }
    if (this.state !== 'idle') {
      return 'busy';
    }

    // A task still finalizing after stopListening() is superseded now
    this.cancelTask();
    this.setState('awaitingPermission');

    let status: SpeechPermissionStatus;
    try {
      status = await this.deps.permissions.requestPermission();
    } catch (err) {
      log.warn({ err }, '[SpeechCaptureService] permission request failed');
      status = 'denied';
    }

    // cancel() ran while the permission prompt was up
    if (this._state.getValue() !== 'awaitingPermission') {
      return 'cancelled';
    }

    if (status !== 'granted') {
      this.setState('idle');
      log.info('[SpeechCaptureService] speech permission denied');
      this._failures.next({ reason: 'permission_denied', error: new PermissionDeniedError('speech') });
      return 'permission_denied';
    }

    try {
      this.beginRecording();
    } catch (err) {
      const error = err instanceof AudioCaptureError ? err : new AudioCaptureError('Audio capture failed to start', err);
      log.error({ err: error }, '[SpeechCaptureService] recording failed');
      this.cancelTask();
      this.teardownAudio();
      this.setState('idle');
      this._failures.next({ reason: 'capture_failed', error });
      return 'capture_failed';
    }

    this._transcription.next('');
    this.setState('recording');
    log.info('[SpeechCaptureService] listening');
    return 'started';
  }

  /**
   * Graceful stop. Returns false when not recording.
   */
  stopListening(): boolean {
    if (this.state !== 'recording') return false;

    this.activeTask?.endAudio();
    this.teardownAudio();
    this._transcription.next('');
    this.setState('idle');
    log.info('[SpeechCaptureService] stopped listening, awaiting final transcript');
    return true;
  }

  /**
   * Hard stop used on disconnect: nothing from the current task is published.
   */
  cancel(): void {
    const state = this.state;
    this.cancelTask();
    this.teardownAudio();
    this._transcription.next('');
    if (state !== 'idle') {
      this.setState('idle');
      log.info({ from: state }, '[SpeechCaptureService] capture cancelled');
    }
  }

  private beginRecording(): void {
    let session: AudioCaptureSession;
    try {
      session = this.deps.audio.open();
    } catch (err) {
      throw new AudioCaptureError('Audio session could not be activated', err);
    }
    this.audioSession = session;

    let task: RecognitionTask | null = null;
    task = this.deps.recognizer.startTask({ partialResults: true }, (event) => {
      if (task !== null) this.handleRecognitionEvent(task, event);
    });
    this.activeTask = task;

    const owner = task;
    session.installTap(this.bufferSize, (buffer) => {
      if (this.activeTask === owner) owner.append(buffer);
    });

    try {
      session.start();
    } catch (err) {
      throw new AudioCaptureError('Audio input could not start', err);
    }
  }

  private handleRecognitionEvent(task: RecognitionTask, event: RecognitionEvent): void {
    // Cancelled or superseded task
    if (task !== this.activeTask) return;

    if (event.type === 'partial') {
      if (this.state === 'recording') {
        this._transcription.next(event.transcript);
      }
      return;
    }

    if (this.state === 'recording') {
      this.setState('finalizing');
      this.teardownAudio();
    }
    this.activeTask = null;
    this._transcription.next('');
    this.setState('idle');

    if (event.type === 'error') {
      log.warn({ err: event.error }, '[SpeechCaptureService] recognition error');
      this._failures.next({ reason: 'recognition_error', error: event.error });
      return;
    }

    const transcript = event.transcript.trim();
    if (transcript.length > 0) {
      log.info({ chars: transcript.length }, '[SpeechCaptureService] final transcript');
      this._finalTranscripts.next(transcript);
    }
  }

  private cancelTask(): void {
    const task = this.activeTask;
    // Detach before cancelling so events emitted during cancel() are dropped
    this.activeTask = null;
    task?.cancel();
  }

  private teardownAudio(): void {
    const session = this.audioSession;
    if (!session) return;
    this.audioSession = null;

    try {
      session.stopTap();
      session.release();
    } catch (err) {
      log.warn({ err }, '[SpeechCaptureService] error releasing audio session');
    }
  }

  private setState(next: SpeechCaptureState): void {
    if (this.state !== next) {
      this._state.next(next);
    }
  }
}
