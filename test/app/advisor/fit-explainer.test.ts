import { buildExplanationMessages, FitExplainer } from '../../../src/app/advisor/fit-explainer.js';
import type { ChatClient } from '../../../src/infra/llm/chat-client.js';
import { AdvisorError } from '../../../src/domain/errors.js';
import { createFixtureEngine } from '../../fixtures/advisor-fixture.js';

describe('FitExplainer', () => {
  const engine = createFixtureEngine();
  const response = engine.score({ answers: { q1: 'make', q2: 'fix' } });
  const label = (trait: string) => engine.label(trait);

  type CompleteMock = jest.Mock<ReturnType<ChatClient['complete']>, Parameters<ChatClient['complete']>>;

  function createClient(): { complete: CompleteMock } {
    return { complete: jest.fn() };
  }

  describe('buildExplanationMessages', () => {
    it('should list the identity and every match with its shared traits', () => {
      const messages = buildExplanationMessages(response, '  I like robots ', { label });

      expect(messages).toHaveLength(2);
      expect(messages[0]?.role).toBe('system');
      expect(messages[1]).toEqual({
        role: 'user',
        content: [
          'Identity snapshot:',
          'You are a Builder. You lean towards: Builder 100%. I like robots',
          '',
          'Programmes:',
          '- Mechanical Engineering (Engineering): 100% match, shared traits: Builder',
          '- Industrial Design (Design): 45% match, shared traits: Builder',
          '- Statistics (Science): 0% match, shared traits: none',
          '',
          'Write 3-5 sentences summarising why these programmes fit, referencing the traits shown.',
        ].join('\n'),
      });
    });
  });

  describe('explain', () => {
    it('should return the trimmed model text', async () => {
      const client = createClient();
      client.complete.mockResolvedValueOnce('  These fit because you build things.\n');
      const explainer = new FitExplainer({ client, model: 'gpt-4o-mini', label });

      await expect(explainer.explain(response)).resolves.toBe('These fit because you build things.');
      expect(client.complete).toHaveBeenCalledWith({
        model: 'gpt-4o-mini',
        temperature: 0.2,
        messages: buildExplanationMessages(response, undefined, { label }),
      });
    });

    it('should return null for an empty answer', async () => {
      const client = createClient();
      client.complete.mockResolvedValueOnce('   ');

      await expect(new FitExplainer({ client, model: 'm' }).explain(response)).resolves.toBeNull();
    });

    it('should skip the call when there are no matches', async () => {
      const client = createClient();

      await expect(new FitExplainer({ client, model: 'm' }).explain({ ...response, matches: [] })).resolves.toBeNull();
      expect(client.complete).not.toHaveBeenCalled();
    });

    it('should log a failed call and return null', async () => {
      const client = createClient();
      client.complete.mockRejectedValueOnce(AdvisorError.explanationFailed('request failed: 500 boom'));
      const logger = { warn: jest.fn() };

      await expect(new FitExplainer({ client, model: 'm', logger }).explain(response)).resolves.toBeNull();
      expect(logger.warn).toHaveBeenCalledWith(
        '[FitExplainer] Skipped: AI explanation unavailable: request failed: 500 boom'
      );
    });
  });
});
