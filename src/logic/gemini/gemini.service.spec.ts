import { Test, TestingModule } from '@nestjs/testing';
import { ConfigService } from '@nestjs/config';
import { GoogleGenAI } from '@google/genai';
import { GeminiService } from './gemini.service';

const mockGenerateContent = jest.fn();

jest.mock('@google/genai', () => ({
  GoogleGenAI: jest.fn().mockImplementation(() => ({ models: { generateContent: mockGenerateContent } })),
}));

const env: Record<string, string | number> = {
  GEMINI_API_KEY: 'test-secret',
  GEMINI_CHAT_MODEL: 'gemini-test',
  COMPLETION_TEMPERATURE: 0.3,
  COMPLETION_MAX_OUTPUT_TOKENS: 256,
};

describe('GeminiService', () => {
  let service: GeminiService;

  beforeEach(async () => {
    mockGenerateContent.mockReset();
    const module: TestingModule = await Test.createTestingModule({
      providers: [
        GeminiService,
        { provide: ConfigService, useValue: { get: (key: string) => env[key] } },
      ],
    }).compile();

    service = module.get<GeminiService>(GeminiService);
  });

  it('should be defined', () => {
    expect(service).toBeDefined();
    expect(GoogleGenAI).toHaveBeenCalledWith({ apiKey: 'test-secret' });
  });

  it('sends the prompt as a single user part with configured defaults', async () => {
    mockGenerateContent.mockResolvedValue({ text: 'You qualify."""' });

    const result = await service.complete('PROMPT', { stopSequences: ['"""'] });

    expect(result).toEqual({ text: 'You qualify."""', model: 'gemini-test' });
    expect(mockGenerateContent).toHaveBeenCalledWith({
      model: 'gemini-test',
      contents: [{ role: 'user', parts: [{ text: 'PROMPT' }] }],
      config: { temperature: 0.3, maxOutputTokens: 256, stopSequences: ['"""'] },
    });
  });

  it('lets per-call options override the configured ones', async () => {
    mockGenerateContent.mockResolvedValue({ text: 'ok' });

    await service.complete('P', { temperature: 0, maxOutputTokens: 16 });

    expect(mockGenerateContent.mock.calls[0][0].config).toEqual({
      temperature: 0,
      maxOutputTokens: 16,
      stopSequences: undefined,
    });
  });

  it('returns an empty string when the model yields no text', async () => {
    mockGenerateContent.mockResolvedValue({ text: undefined });
    await expect(service.complete('P')).resolves.toEqual({ text: '', model: 'gemini-test' });
  });

  it('rethrows backend failures unmodified', async () => {
    const quota = new Error('RESOURCE_EXHAUSTED');
    mockGenerateContent.mockRejectedValue(quota);
    await expect(service.complete('P')).rejects.toBe(quota);
  });
});
