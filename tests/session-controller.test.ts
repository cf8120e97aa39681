import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import type { ChatMessage } from '../src/contracts/assistant.contracts.js';
import { haversineMeters } from '../src/lib/geo/distance-calculator.js';
import type { RandomSource } from '../src/lib/random/random-source.js';
import type { ChatGenerationConfig, ChatReply } from '../src/llm/types.js';
import { ConversationClient } from '../src/services/conversation/conversation-client.js';
import { FALLBACK_MESSAGES } from '../src/services/conversation/conversation.errors.js';
import { LocationResolver } from '../src/services/location/location-resolver.js';
import type { LocationPermission, PermissionStatus } from '../src/services/location/location.types.js';
import { WELCOME_TEXT } from '../src/services/session/message.factory.js';
import { SessionController, buildLocationPrompt, type ConnectionStatus } from '../src/services/session/session-controller.js';
import { SpeechCaptureService } from '../src/services/speech/speech-capture.service.js';
import { AssistantDataStore } from '../src/store/assistant-data.store.js';
import { InMemoryPersistenceStore } from '../src/store/in-memory-persistence.store.js';
import {
    Deferred,
    FakeAudioProvider,
    FakeChatAPI,
    FakeGeocoder,
    FakeLocationPermissions,
    FakeLocationProvider,
    FakeRecognizer,
    FakeScheduler,
    FakeSpeechPermissions,
    flushPromises,
    makeFix,
    reply
} from './helpers/fakes.js';

const generation: ChatGenerationConfig = {
    model: 'test-model',
    temperature: 0.7,
    topP: 0.95,
    topK: 64,
    maxOutputTokens: 2048
};

const zero: RandomSource = { next: () => 0 };

function setup(permission: PermissionStatus = 'authorizedWhenInUse') {
    const chat = new FakeChatAPI();
    const persistence = new InMemoryPersistenceStore();
    const store = new AssistantDataStore(persistence);
    const conversation = new ConversationClient(chat, { systemPrompt: 'SYSTEM', timeoutMs: 1000 });
    const locationPermissions = new FakeLocationPermissions(permission);
    const locations = new FakeLocationProvider();
    const location = new LocationResolver({
        permissions: locationPermissions,
        locations,
        geocoder: new FakeGeocoder(),
        scheduler: new FakeScheduler()
    });
    const recognizer = new FakeRecognizer();
    const speech = new SpeechCaptureService({
        permissions: new FakeSpeechPermissions(),
        audio: new FakeAudioProvider(),
        recognizer,
        voiceInputEnabled: true
    });
    const controller = new SessionController({
        store,
        conversation,
        location,
        speech,
        generation,
        random: zero
    });
    location.start();

    const messages: Array<readonly ChatMessage[]> = [];
    controller.messages$.subscribe(m => messages.push(m));
    const locationRequests: LocationPermission[] = [];
    controller.locationRequests$.subscribe(p => locationRequests.push(p));

    return { chat, persistence, store, conversation, locations, location, recognizer, speech, controller, messages, locationRequests };
}

async function connected(permission?: PermissionStatus) {
    const ctx = setup(permission);
    assert.equal(await ctx.controller.connect(), true);
    return ctx;
}

describe('buildLocationPrompt', () => {
    it('embeds the fix coordinates', () => {
        assert.equal(
            buildLocationPrompt('any sushi?', makeFix(37.5, -122.25)),
            'Please find restaurants at these exact coordinates: 37.5, -122.25. The user is asking: any sushi?'
        );
    });

    it('asks for nearby results without a fix', () => {
        assert.equal(buildLocationPrompt('any sushi?', undefined), 'I am looking for restaurants nearby. any sushi?');
    });
});

describe('SessionController', () => {
    it('connects, publishing status changes and a welcome message', async () => {
        const { controller, store, chat } = setup();
        const statuses: ConnectionStatus[] = [];
        controller.status$.subscribe(s => statuses.push(s));

        assert.equal(await controller.connect(), true);

        assert.deepEqual(statuses, ['disconnected', 'connecting', 'connected']);
        assert.deepEqual(chat.started, [generation]);
        assert.equal(store.history.length, 1);
        assert.equal(store.history[0]?.kind, 'welcome');
        assert.equal(store.history[0]?.text, WELCOME_TEXT);
    });

    it('skips the welcome message when history exists and ignores a second connect', async () => {
        const { controller, store, chat } = setup();
        store.appendMessage({ id: 'old', text: 'earlier', sender: 'user', timestamp: 1, kind: 'text', entities: [] });

        await controller.connect();
        assert.equal(await controller.connect(), true);

        assert.deepEqual(store.history.map(m => m.id), ['old']);
        assert.equal(chat.started.length, 1);
    });

    it('falls back to disconnected when the session cannot start', async () => {
        const { controller, chat, store } = setup();
        chat.startFailure = new Error('bad credentials');

        assert.equal(await controller.connect(), false);
        assert.equal(controller.status, 'disconnected');
        assert.deepEqual(store.history, []);
    });

    it('appends nothing while disconnected', async () => {
        const { controller, store, chat } = setup();

        const outcome = await controller.submitUserText('falafel');

        assert.deepEqual(outcome, { status: 'rejected', reason: 'not_connected' });
        assert.deepEqual(store.history, []);
        assert.deepEqual(chat.sent, []);
    });

    it('rejects blank input', async () => {
        const { controller, store } = await connected();
        assert.deepEqual(await controller.submitUserText('   '), { status: 'rejected', reason: 'empty' });
        assert.equal(store.history.length, 1);
    });

    it('answers with a restaurant list built from the reply', async () => {
        const { controller, store, chat } = await connected();
        chat.script.push(reply('ready'), reply('I recommend an Italian restaurant nearby'));

        const outcome = await controller.submitUserText('  dinner tonight ');

        assert.equal(outcome.status, 'answered');
        const [, user, assistant] = store.history;
        assert.equal(user?.sender, 'user');
        assert.equal(user?.text, 'dinner tonight');
        assert.equal(assistant?.kind, 'restaurantList');
        assert.equal(assistant?.text, 'I recommend an Italian restaurant nearby');
        assert.deepEqual(assistant?.entities.map(e => e.cuisines), [['Italian']]);
        assert.deepEqual(controller.displayedRestaurants.map(r => r.name), ['Italian Delight']);
        assert.equal(controller.isProcessing, false);
        assert.deepEqual(store.recentSearches, ['dinner tonight']);
        assert.deepEqual(chat.sent, ['SYSTEM', 'I am looking for restaurants nearby. dinner tonight']);
    });

    it('appends a plain text reply without touching the displayed set', async () => {
        const { controller, store, chat } = await connected();
        chat.script.push(reply('ready'), reply('The weather is nice today'));

        await controller.submitUserText('hello');

        assert.equal(store.history.at(-1)?.kind, 'text');
        assert.deepEqual(controller.displayedRestaurants, []);
    });

    it('augments the prompt with the current fix', async () => {
        const { controller, chat, locations, store } = await connected();
        locations.emitFix(makeFix(40.5, -73.25));
        chat.script.push(reply('ready'), reply('A Greek taverna place is close by'));

        await controller.submitUserText('lunch');

        assert.equal(
            chat.sent[1],
            'Please find restaurants at these exact coordinates: 40.5, -73.25. The user is asking: lunch'
        );
        const entity = store.history.at(-1)?.entities[0];
        assert.ok(entity);
        assert.equal(entity.distanceMeters, haversineMeters(makeFix(40.5, -73.25), entity.coordinates));
    });

    it('asks for location access when it is blocked and there is no fix', async () => {
        const { controller, locationRequests, chat } = await connected('denied');

        await controller.submitUserText('tacos');

        assert.deepEqual(locationRequests, ['denied']);
        assert.equal(chat.sent[1], 'I am looking for restaurants nearby. tacos');
    });

    it('appends exactly one fallback message on a transient failure', async () => {
        const { controller, store, chat } = await connected();
        chat.script.push(reply('ready'), new Error('socket hang up'));

        const outcome = await controller.submitUserText('sushi');

        assert.equal(outcome.status, 'failed');
        assert.equal(store.history.length, 3);
        const last = store.history.at(-1);
        assert.equal(last?.kind, 'error');
        assert.equal(last?.text, FALLBACK_MESSAGES.transient);
        assert.equal(store.history.filter(m => m.kind === 'error').length, 1);
        assert.equal(controller.isProcessing, false);
    });

    it('uses the distinct fallback for an empty reply', async () => {
        const { controller, store, chat } = await connected();
        chat.script.push(reply('ready'), reply(null, true));

        await controller.submitUserText('sushi');

        assert.equal(store.history.at(-1)?.text, FALLBACK_MESSAGES.empty_or_unsafe);
    });

    it('rejects a second submission while one is processing', async () => {
        const { controller, chat, store } = await connected();
        const gate = new Deferred<ChatReply>();
        chat.script.push(reply('ready'), gate);

        const first = controller.submitUserText('first');
        assert.deepEqual(await controller.submitUserText('second'), { status: 'rejected', reason: 'busy' });

        gate.resolve(reply('ok'));
        await first;
        assert.deepEqual(store.history.filter(m => m.sender === 'user').map(m => m.text), ['first']);
    });

    it('discards a response that arrives after disconnect', async () => {
        const { controller, chat, store } = await connected();
        const gate = new Deferred<ChatReply>();
        chat.script.push(reply('ready'), gate);

        const pending = controller.submitUserText('slow question');
        await flushPromises();
        controller.disconnect();
        const before = store.history;
        gate.resolve(reply('An Italian restaurant'));

        assert.deepEqual(await pending, { status: 'discarded' });
        assert.equal(store.history, before);
        assert.equal(controller.status, 'disconnected');
        assert.equal(controller.isProcessing, false);
        assert.deepEqual(controller.displayedRestaurants, []);
    });

    it('recomputes distances in history and the displayed set on a new fix', async () => {
        const { controller, chat, store, locations } = await connected();
        locations.emitFix(makeFix(10, 10));
        chat.script.push(reply('ready'), reply('Try this Thai place'));
        await controller.submitUserText('thai');

        const previous = store.history.at(-1);
        const fix = makeFix(10.5, 10);
        locations.emitFix(fix);

        const updated = store.history.at(-1);
        assert.ok(previous && updated);
        assert.notEqual(updated, previous);
        assert.equal(updated.id, previous.id);
        const [record] = updated.entities;
        assert.ok(record);
        assert.equal(record.distanceMeters, haversineMeters(fix, record.coordinates));
        assert.equal(controller.displayedRestaurants[0]?.distanceMeters, record.distanceMeters);
        // the earlier record object is left as it was
        assert.notEqual(previous.entities[0]?.distanceMeters, record.distanceMeters);
    });

    it('submits finalized voice transcripts', async () => {
        const { controller, recognizer, chat, store } = await connected();
        chat.script.push(reply('ready'), reply('Mexican grill downtown'));

        assert.equal(await controller.startListening(), 'started');
        recognizer.last?.emit({ type: 'final', transcript: ' tacos please ' });
        await flushPromises();
        await flushPromises();

        assert.equal(store.history[1]?.text, 'tacos please');
        assert.equal(store.history[2]?.kind, 'restaurantList');
        assert.equal(chat.sent[1], 'I am looking for restaurants nearby. tacos please');
    });

    it('cancels voice capture on disconnect', async () => {
        const { controller, speech, recognizer } = await connected();
        await controller.startListening();

        controller.disconnect();

        assert.equal(speech.state, 'idle');
        assert.equal(recognizer.last?.cancelled, true);
    });

    it('filters and sorts the displayed restaurants', async () => {
        const { controller, chat } = await connected();
        chat.script.push(reply('ready'), reply('Italian, Thai and Greek restaurant picks'));
        await controller.submitUserText('options');

        assert.deepEqual(controller.displayedRestaurants.map(r => r.cuisines[0]), ['Italian', 'Thai', 'Greek']);

        const filtered = controller.filterRestaurants({ cuisines: ['Thai'] });
        assert.deepEqual(filtered.map(r => r.name), ['Thai Delight']);

        controller.filterRestaurants({});
        controller.setSortOption('rating');
        assert.equal(controller.displayedRestaurants.length, 3);
    });

    it('clears history and the displayed set', async () => {
        const { controller, chat, store } = await connected();
        chat.script.push(reply('ready'), reply('Indian restaurant'));
        await controller.submitUserText('curry');

        controller.clearHistory();

        assert.deepEqual(store.history, []);
        assert.deepEqual(controller.displayedRestaurants, []);
    });

    it('toggles favorites and builds suggestions from recent searches', async () => {
        const { controller, chat } = await connected();
        chat.script.push(reply('ready'), reply('Japanese restaurant'));
        await controller.submitUserText('ramen');

        const [record] = controller.displayedRestaurants;
        assert.ok(record);
        assert.equal(controller.toggleFavorite(record), true);
        assert.equal(controller.isFavorite(record), true);

        assert.equal(controller.suggestedQueries()[0], 'ramen');
        assert.equal(controller.suggestedQueries().length, 6);
        assert.ok(controller.availableCuisines().includes('Korean'));
    });

    it('keeps messages observable as immutable snapshots', async () => {
        const { controller, messages } = await connected();
        assert.equal(messages.length, 2);
        assert.deepEqual(messages[0], []);
        assert.equal(messages[1]?.[0]?.kind, 'welcome');
        assert.equal(Object.isFrozen(messages[1]?.[0]), true);
        assert.equal(controller.messages, messages[1]);
    });
});
