import assert from 'node:assert/strict';
import { after, before, test } from 'node:test';

import { GatewayError } from '../src/errors';
import { ImagingService, resolveGeneration } from '../src/prompt/imaging';
import {
  createRecordingLogger,
  FakeImageAiClient,
  InMemoryObjectStore,
  sequentialIds,
  startStubServer,
  type StubServer
} from './helpers';

const FIRST_URL = 'https://cdn.example.test/image_00000000000040008000000000000001.png';

let sources: StubServer;

before(async () => {
  sources = await startStubServer((request, res) => {
    if (request.url === '/cat.webp') {
      res.setHeader('Content-Type', 'image/webp');
      res.end(Buffer.from('webp-bytes'));
      return;
    }
    if (request.url === '/sketch') {
      res.setHeader('Content-Type', 'application/octet-stream');
      res.end(Buffer.from('raw-bytes'));
      return;
    }
    res.statusCode = 404;
    res.end('missing');
  });
});

after(async () => {
  await sources.close();
});

function buildService(client: FakeImageAiClient | null = new FakeImageAiClient()) {
  const objectStore = new InMemoryObjectStore('https://cdn.example.test');
  const service = new ImagingService({ client, objectStore, generateId: sequentialIds() });
  const logger = createRecordingLogger();
  return { service, objectStore, logger, context: { logger } };
}

test('resolveGeneration picks the size default for each model', () => {
  assert.deepEqual(resolveGeneration({ prompt: 'a lighthouse' }), {
    prompt: 'a lighthouse',
    model: 'gpt-image-1',
    count: 1,
    size: 'auto'
  });
  assert.equal(resolveGeneration({ prompt: 'a lighthouse', model: 'dall-e-2', count: 3 }).size, '1024x1024');
  assert.equal(resolveGeneration({ prompt: 'a lighthouse', model: 'dall-e-3' }).size, '1024x1024');
  assert.equal(resolveGeneration({ prompt: 'a lighthouse', size: '1536x1024' }).size, '1536x1024');
});

test('resolveGeneration rejects sizes and counts the model cannot serve', () => {
  assert.throws(() => resolveGeneration({ prompt: 'p', model: 'dall-e-2', size: '1536x1024' }), {
    name: 'GatewayError',
    message: 'Size 1536x1024 is not supported by dall-e-2; use one of: 256x256, 512x512, 1024x1024'
  });
  assert.throws(() => resolveGeneration({ prompt: 'p', model: 'dall-e-3', count: 2 }), {
    message: 'dall-e-3 generates one image per request'
  });
});

test('generated images are stored and hosted results pass through', async () => {
  const client = new FakeImageAiClient();
  client.images = [
    { base64: 'aGVsbG8=', url: null },
    { base64: null, url: 'https://images.provider.test/abc.png' }
  ];
  const { service, objectStore, context } = buildService(client);

  const urls = await service.generate({ prompt: 'a lighthouse', model: 'dall-e-2', count: 2 }, context);

  assert.deepEqual(urls, [FIRST_URL, 'https://images.provider.test/abc.png']);
  assert.deepEqual(client.generateRequests, [
    { prompt: 'a lighthouse', model: 'dall-e-2', count: 2, size: '1024x1024' }
  ]);
  const stored = objectStore.objects.get('image_00000000000040008000000000000001.png');
  assert.ok(stored);
  assert.equal(stored.contentType, 'image/png');
  assert.equal(Buffer.from(stored.body).toString('utf8'), 'hello');
});

test('an unconfigured provider is reported as unavailable', async () => {
  const { service, context } = buildService(null);

  await assert.rejects(service.generate({ prompt: 'p' }, context), (err: unknown) => {
    assert.ok(err instanceof GatewayError);
    assert.equal(err.code, 'IMAGE_AI_UNAVAILABLE');
    return true;
  });
});

test('provider errors and empty results become provider failures', async () => {
  const client = new FakeImageAiClient();
  const { service, context } = buildService(client);

  client.failure = new Error('rate limited');
  await assert.rejects(service.generate({ prompt: 'p' }, context), {
    name: 'GatewayError',
    message: 'Failed to generate images: rate limited'
  });

  client.failure = null;
  client.images = [];
  await assert.rejects(service.generate({ prompt: 'p' }, context), {
    message: 'Failed to generate images: provider returned no images'
  });
});

test('edit downloads every source image before calling the provider', async () => {
  const client = new FakeImageAiClient();
  const { service, context } = buildService(client);

  const urls = await service.edit(
    { image_urls: [`${sources.baseUrl}/cat.webp`, `${sources.baseUrl}/sketch`], prompt: 'add a hat' },
    context
  );

  assert.deepEqual(urls, [FIRST_URL]);
  assert.equal(client.editRequests.length, 1);
  const [request] = client.editRequests;
  assert.equal(request.prompt, 'add a hat');
  assert.deepEqual(
    request.images.map((image) => ({
      filename: image.filename,
      contentType: image.contentType,
      body: Buffer.from(image.bytes).toString('utf8')
    })),
    [
      { filename: 'source-1.webp', contentType: 'image/webp', body: 'webp-bytes' },
      { filename: 'source-2.png', contentType: 'image/png', body: 'raw-bytes' }
    ]
  );
});

test('a missing source image fails the edit without calling the provider', async () => {
  const client = new FakeImageAiClient();
  const { service, context } = buildService(client);
  const missing = `${sources.baseUrl}/gone.png`;

  await assert.rejects(service.edit({ image_urls: [missing], prompt: 'add a hat' }, context), (err: unknown) => {
    assert.ok(err instanceof GatewayError);
    assert.equal(err.code, 'INVALID_IMAGE');
    assert.equal(err.message, `Failed to fetch image ${missing}: HTTP 404`);
    return true;
  });
  assert.deepEqual(client.editRequests, []);
});

test('a prompt answered without tools returns the model reply', async () => {
  const client = new FakeImageAiClient();
  client.replies = [{ content: 'I can only help with images.', toolCalls: [] }];
  const { service, context } = buildService(client);

  const result = await service.runPrompt({ prompt: 'hello', model: 'gpt-4.1-nano', temperature: 0.7 }, context);

  assert.deepEqual(result, {
    originalPrompt: 'hello',
    generatedImages: null,
    editedImages: null,
    message: 'I can only help with images.'
  });
  assert.equal(client.chatRequests.length, 1);
  assert.deepEqual(
    client.chatRequests[0].tools.map((tool) => tool.name),
    ['generate_image', 'edit_image']
  );
});

test('a generate tool call is executed and reported back to the model', async () => {
  const client = new FakeImageAiClient();
  const toolCall = { id: 'call_1', name: 'generate_image', arguments: '{"prompt":"a red fox","model":"dall-e-2"}' };
  client.replies = [
    { content: null, toolCalls: [toolCall] },
    { content: 'Here is your fox.', toolCalls: [] }
  ];
  const { service, context } = buildService(client);

  const result = await service.runPrompt({ prompt: 'draw a fox', model: 'gpt-4.1-nano', temperature: 0.2 }, context);

  assert.deepEqual(result, {
    originalPrompt: 'draw a fox',
    generatedImages: [FIRST_URL],
    editedImages: null,
    message: 'Here is your fox.'
  });
  assert.deepEqual(client.generateRequests, [{ prompt: 'a red fox', model: 'dall-e-2', count: 1, size: '1024x1024' }]);

  assert.equal(client.chatRequests.length, 2);
  assert.equal(client.chatRequests[0].messages.length, 2);
  assert.deepEqual(client.chatRequests[1].messages.slice(2), [
    { role: 'assistant', content: null, toolCalls: [toolCall] },
    { role: 'tool', toolCallId: 'call_1', content: JSON.stringify({ urls: [FIRST_URL] }) }
  ]);
  assert.equal(client.chatRequests[1].temperature, 0.2);
});

test('failing tool calls are answered with their error', async () => {
  const client = new FakeImageAiClient();
  client.replies = [
    {
      content: 'Working on it.',
      toolCalls: [
        { id: 'call_1', name: 'generate_image', arguments: 'not json' },
        { id: 'call_2', name: 'make_video', arguments: '{}' }
      ]
    },
    { content: null, toolCalls: [] }
  ];
  const { service, logger, context } = buildService(client);

  const result = await service.runPrompt({ prompt: 'surprise me', model: 'gpt-4.1-nano', temperature: 0.7 }, context);

  assert.deepEqual(result, {
    originalPrompt: 'surprise me',
    generatedImages: null,
    editedImages: null,
    message: 'Working on it.'
  });
  assert.deepEqual(client.chatRequests[1].messages.slice(3), [
    {
      role: 'tool',
      toolCallId: 'call_1',
      content: JSON.stringify({ error: 'Invalid arguments for generate_image: <root>: Required' })
    },
    { role: 'tool', toolCallId: 'call_2', content: JSON.stringify({ error: 'Unknown tool make_video' }) }
  ]);
  assert.deepEqual(client.generateRequests, []);
  assert.deepEqual(
    logger.entries.filter((entry) => entry.level === 'warn').map((entry) => entry.obj.tool),
    ['generate_image', 'make_video']
  );
});
