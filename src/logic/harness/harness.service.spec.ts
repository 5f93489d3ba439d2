import { Test, TestingModule } from '@nestjs/testing';
import { ConfigService } from '@nestjs/config';
import { CompletionBackend } from '../gemini/completion-backend';
import { InvalidInputError } from './harness.errors';
import { HarnessService } from './harness.service';

describe('HarnessService', () => {
  let service: HarnessService;
  const backend = { complete: jest.fn() };

  beforeEach(async () => {
    backend.complete.mockReset();
    const module: TestingModule = await Test.createTestingModule({
      providers: [
        HarnessService,
        { provide: CompletionBackend, useValue: backend },
        { provide: ConfigService, useValue: { get: () => '@@' } },
      ],
    }).compile();

    service = module.get<HarnessService>(HarnessService);
  });

  it('should be defined', () => {
    expect(service).toBeDefined();
  });

  it('uses the configured delimiter when the request names none', () => {
    const assembly = service.assemble({ snippet: 'Permit info', turns: [{ speaker: 'user', text: 'Fee?' }] });
    expect(assembly.delimiter).toBe('@@');
    expect(assembly.prompt).toContain('User: @@Fee?@@');
    expect(assembly.prompt.endsWith('Assistant: @@')).toBe(true);
  });

  it('prefers the request delimiter over the configured one', () => {
    expect(service.assemble({ snippet: 'Permit info', turns: [], delimiter: '%%' }).delimiter).toBe('%%');
  });

  it('sends the assembled prompt with the delimiter as stop sequence and extracts the reply', async () => {
    backend.complete.mockResolvedValue({ text: ' It costs 40 EUR.@@ User: @@', model: 'fake-model' });

    const result = await service.complete(
      { snippet: 'Permit fee is 40 EUR.', turns: [{ speaker: 'user', text: 'Fee?' }] },
      { temperature: 0 },
    );

    const expectedPrompt = service.assemble({ snippet: 'Permit fee is 40 EUR.', turns: [{ speaker: 'user', text: 'Fee?' }] }).prompt;
    expect(backend.complete).toHaveBeenCalledWith(expectedPrompt, { temperature: 0, stopSequences: ['@@'] });
    expect(result).toEqual({
      prompt: expectedPrompt,
      completion: ' It costs 40 EUR.@@ User: @@',
      reply: 'It costs 40 EUR.',
      model: 'fake-model',
    });
  });

  it('fails on an empty snippet before calling the backend', async () => {
    await expect(service.complete({ snippet: ' ', turns: [] })).rejects.toBeInstanceOf(InvalidInputError);
    expect(backend.complete).not.toHaveBeenCalled();
  });

  it('surfaces backend errors unmodified', async () => {
    const failure = new Error('network down');
    backend.complete.mockRejectedValue(failure);
    await expect(service.complete({ snippet: 'x', turns: [] })).rejects.toBe(failure);
    expect(backend.complete).toHaveBeenCalledTimes(1);
  });

  it('disassembles with the configured delimiter', () => {
    const { prompt } = service.assemble({ snippet: 'x', turns: [{ speaker: 'assistant', text: 'Hello' }] });
    expect(service.disassemble(prompt)).toEqual({ snippet: 'x', turns: [{ speaker: 'assistant', text: 'Hello' }] });
  });
});
