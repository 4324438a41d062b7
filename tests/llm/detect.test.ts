import { describe, it, expect, jest, beforeEach, afterEach } from '@jest/globals';
import {
  DETECTION_SYSTEM_PROMPT,
  MAX_DETECTION_FILES,
  applyDetectedStack,
  buildDetectionPrompt,
  detectFrameworks,
  parseDetectionResponse,
} from '../../src/llm/detect.js';
import { logger } from '../../src/core/logger.js';
import { FakeLlmClient } from '../helpers/fake-client.js';
import { makeAnalysis } from '../helpers/analysis.js';

const OPTIONS = { model: 'detect-model', maxTokens: 1000, temperature: 0.3 };

describe('framework detection', () => {
  let warnSpy: jest.SpiedFunction<typeof logger.warn>;

  beforeEach(() => {
    warnSpy = jest.spyOn(logger, 'warn').mockImplementation(() => {});
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('should parse a bare JSON reply', () => {
    expect(
      parseDetectionResponse(
        '{"frameworks":["Express"],"technologies":["Docker"],"project_type":"API"}',
      ),
    ).toEqual({ frameworks: ['Express'], technologies: ['Docker'], projectType: 'API' });
  });

  it('should extract JSON surrounded by prose or fences', () => {
    const reply = 'Here you go:\n```json\n{"frameworks":["React"],"project_type":"Web Application"}\n```';
    expect(parseDetectionResponse(reply)).toEqual({
      frameworks: ['React'],
      technologies: [],
      projectType: 'Web Application',
    });
  });

  it('should reject replies without a usable object', () => {
    expect(parseDetectionResponse('no idea')).toBeNull();
    expect(parseDetectionResponse('{"frameworks": "React"}')).toBeNull();
    expect(parseDetectionResponse('{broken')).toBeNull();
  });

  it('should include repository facts and at most ten key files in the prompt', () => {
    const keyFiles = Array.from({ length: 12 }, (_, i) => ({
      path: `src/file${i}.ts`,
      content: `content ${i}`,
      extension: '.ts',
    }));
    const prompt = buildDetectionPrompt(
      makeAnalysis({ repoName: 'shop', languages: ['.ts', '.json'], totalFiles: 12, keyFiles }),
    );

    expect(prompt).toContain('Repository: shop');
    expect(prompt).toContain('File extensions found: .ts, .json');
    expect(prompt).toContain('Total files: 12');
    expect(prompt).toContain(`--- src/file${MAX_DETECTION_FILES - 1}.ts ---\ncontent 9`);
    expect(prompt).not.toContain('--- src/file10.ts ---');
  });

  it('should send the detection request with the given model settings', async () => {
    const client = new FakeLlmClient(['{"frameworks":["Flask"],"technologies":[],"project_type":"API"}']);
    const detected = await detectFrameworks(makeAnalysis(), client, OPTIONS);

    expect(detected.frameworks).toEqual(['Flask']);
    expect(client.requests).toHaveLength(1);
    expect(client.requests[0]).toMatchObject({
      model: 'detect-model',
      maxTokens: 1000,
      temperature: 0.3,
      systemPrompt: DETECTION_SYSTEM_PROMPT,
    });
  });

  it('should fall back to an unknown stack when the call fails', async () => {
    const client = new FakeLlmClient([new Error('network down')]);
    const detected = await detectFrameworks(makeAnalysis(), client, OPTIONS);

    expect(detected).toEqual({ frameworks: [], technologies: [], projectType: 'Unknown' });
    expect(warnSpy).toHaveBeenCalledWith('AI framework detection failed: network down');
  });

  it('should fall back to an unknown stack when the reply is not JSON', async () => {
    const client = new FakeLlmClient(['I think it is a web app']);
    const detected = await detectFrameworks(makeAnalysis(), client, OPTIONS);

    expect(detected.projectType).toBe('Unknown');
    expect(warnSpy).toHaveBeenCalledWith('Could not parse AI response for framework detection');
  });

  it('should merge detected frameworks without duplicates', () => {
    const merged = applyDetectedStack(makeAnalysis({ frameworks: ['React'] }), {
      frameworks: ['React', 'Next.js'],
      technologies: ['Vercel'],
      projectType: 'Web Application',
    });
    expect(merged.frameworks).toEqual(['React', 'Next.js']);
    expect(merged.technologies).toEqual(['Vercel']);
    expect(merged.projectType).toBe('Web Application');
  });
});
