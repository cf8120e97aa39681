import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { SpeechCaptureService } from '../src/services/speech/speech-capture.service.js';
import {
    AudioCaptureError,
    PermissionDeniedError,
    type SpeechCaptureState,
    type SpeechFailure,
    type SpeechPermissionStatus
} from '../src/services/speech/speech.types.js';
import {
    Deferred,
    FakeAudioProvider,
    FakeRecognizer,
    FakeSpeechPermissions
} from './helpers/fakes.js';

function setup(voiceInputEnabled = true) {
    const permissions = new FakeSpeechPermissions();
    const audio = new FakeAudioProvider();
    const recognizer = new FakeRecognizer();
    const service = new SpeechCaptureService({ permissions, audio, recognizer, voiceInputEnabled });

    const states: SpeechCaptureState[] = [];
    const finals: string[] = [];
    const failures: SpeechFailure[] = [];
    service.state$.subscribe(s => states.push(s));
    service.finalTranscripts$.subscribe(t => finals.push(t));
    service.failures$.subscribe(f => failures.push(f));

    return { permissions, audio, recognizer, service, states, finals, failures };
}

describe('SpeechCaptureService', () => {
    it('records after permission is granted and forwards audio to the task', async () => {
        const { service, audio, recognizer, states } = setup();

        assert.equal(await service.startListening(), 'started');

        assert.deepEqual(states, ['idle', 'awaitingPermission', 'recording']);
        assert.deepEqual(recognizer.options, [{ partialResults: true }]);
        const session = audio.last;
        assert.ok(session);
        assert.equal(session.tapSize, 1024);
        assert.equal(session.started, true);

        session.push();
        session.push();
        assert.equal(recognizer.last?.appended, 2);
    });

    it('publishes partial transcripts only as the current transcription', async () => {
        const { service, recognizer, finals } = setup();
        await service.startListening();

        recognizer.last?.emit({ type: 'partial', transcript: 'sushi near' });
        assert.equal(service.currentTranscription, 'sushi near');
        assert.deepEqual(finals, []);
    });

    it('publishes the trimmed final transcript and returns to idle', async () => {
        const { service, recognizer, audio, finals, states } = setup();
        await service.startListening();

        recognizer.last?.emit({ type: 'final', transcript: '  sushi near me  ' });

        assert.deepEqual(finals, ['sushi near me']);
        assert.equal(service.state, 'idle');
        assert.equal(service.currentTranscription, '');
        assert.deepEqual(states.slice(-2), ['finalizing', 'idle']);
        assert.equal(audio.last?.released, true);
    });

    it('drops an empty final transcript', async () => {
        const { service, recognizer, finals } = setup();
        await service.startListening();

        recognizer.last?.emit({ type: 'final', transcript: '   ' });
        assert.deepEqual(finals, []);
        assert.equal(service.state, 'idle');
    });

    it('does nothing when started while recording', async () => {
        const { service, recognizer, permissions } = setup();
        await service.startListening();

        assert.equal(await service.startListening(), 'busy');
        assert.equal(service.state, 'recording');
        assert.equal(recognizer.tasks.length, 1);
        assert.equal(permissions.requests, 1);
    });

    it('does nothing when stopped while idle', () => {
        const { service, states } = setup();
        assert.equal(service.stopListening(), false);
        assert.deepEqual(states, ['idle']);
    });

    it('stops gracefully and still publishes the final transcript', async () => {
        const { service, recognizer, audio, finals } = setup();
        await service.startListening();
        const task = recognizer.last;
        assert.ok(task);

        assert.equal(service.stopListening(), true);
        assert.equal(task.endedAudio, true);
        assert.equal(task.cancelled, false);
        assert.equal(service.state, 'idle');
        assert.equal(audio.last?.stopped, true);

        task.emit({ type: 'final', transcript: 'falafel' });
        assert.deepEqual(finals, ['falafel']);
    });

    it('cancels the previous task when a new capture starts', async () => {
        const { service, recognizer, finals } = setup();
        await service.startListening();
        service.stopListening();
        const first = recognizer.last;
        assert.ok(first);

        await service.startListening();
        assert.equal(first.cancelled, true);

        first.emit({ type: 'final', transcript: 'old words' });
        assert.deepEqual(finals, []);
        assert.equal(service.state, 'recording');
        assert.equal(recognizer.tasks.length, 2);
    });

    it('records after a late final from the stopped task arrives during the permission prompt', async () => {
        const { service, recognizer, permissions, finals } = setup();
        await service.startListening();
        service.stopListening();
        const first = recognizer.last;
        assert.ok(first);

        permissions.gate = new Deferred<SpeechPermissionStatus>();
        const starting = service.startListening();
        assert.equal(first.cancelled, true);

        first.emit({ type: 'final', transcript: 'late words' });
        assert.equal(service.state, 'awaitingPermission');

        permissions.gate.resolve('granted');
        assert.equal(await starting, 'started');
        assert.equal(service.state, 'recording');
        assert.equal(recognizer.tasks.length, 2);
        assert.deepEqual(finals, []);
    });

    it('drops everything from a task after cancel', async () => {
        const { service, recognizer, finals, failures } = setup();
        await service.startListening();
        const task = recognizer.last;
        assert.ok(task);

        service.cancel();
        task.emit({ type: 'partial', transcript: 'ignored' });
        task.emit({ type: 'final', transcript: 'ignored' });

        assert.equal(task.cancelled, true);
        assert.equal(service.currentTranscription, '');
        assert.deepEqual(finals, []);
        assert.deepEqual(failures, []);
        assert.equal(service.state, 'idle');
    });

    it('returns to idle on a recognition error without publishing text', async () => {
        const { service, recognizer, finals, failures } = setup();
        await service.startListening();

        const error = new Error('recognizer crashed');
        recognizer.last?.emit({ type: 'error', error });

        assert.equal(service.state, 'idle');
        assert.deepEqual(finals, []);
        assert.deepEqual(failures, [{ reason: 'recognition_error', error }]);
    });

    it('reports a denied permission', async () => {
        const { service, permissions, failures, recognizer } = setup();
        permissions.status = 'denied';

        assert.equal(await service.startListening(), 'permission_denied');
        assert.equal(service.state, 'idle');
        assert.equal(recognizer.tasks.length, 0);
        const [failure] = failures;
        assert.ok(failure?.reason === 'permission_denied');
        assert.ok(failure.error instanceof PermissionDeniedError);
        assert.equal(failure.error.resource, 'speech');
    });

    it('reports unavailable when voice input is disabled', async () => {
        const { service, permissions, failures } = setup(false);

        assert.equal(service.isAvailable, false);
        assert.equal(await service.startListening(), 'unavailable');
        assert.equal(permissions.requests, 0);
        assert.deepEqual(failures, [{ reason: 'unavailable' }]);
    });

    it('aborts to idle when the audio input fails to start', async () => {
        const { service, audio, recognizer, failures } = setup();
        audio.failStart = true;

        assert.equal(await service.startListening(), 'capture_failed');
        assert.equal(service.state, 'idle');
        assert.equal(recognizer.last?.cancelled, true);
        assert.equal(audio.last?.released, true);
        const [failure] = failures;
        assert.ok(failure?.reason === 'capture_failed');
        assert.ok(failure.error instanceof AudioCaptureError);
    });

    it('aborts when the audio session cannot be opened', async () => {
        const { service, audio, recognizer } = setup();
        audio.failOpen = true;

        assert.equal(await service.startListening(), 'capture_failed');
        assert.equal(recognizer.tasks.length, 0);
        assert.equal(service.state, 'idle');
    });

    it('gives up quietly when cancelled during the permission prompt', async () => {
        const { service, permissions, recognizer } = setup();
        permissions.gate = new Deferred<SpeechPermissionStatus>();

        const starting = service.startListening();
        assert.equal(service.state, 'awaitingPermission');
        service.cancel();
        permissions.gate.resolve('granted');

        assert.equal(await starting, 'cancelled');
        assert.equal(recognizer.tasks.length, 0);
        assert.equal(service.state, 'idle');
    });
});
