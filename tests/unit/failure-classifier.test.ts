import { describe, it, expect } from 'vitest';
import { FailureClassifier } from '../../src/backends/failure-classifier.js';

describe('FailureClassifier', () => {
  const classifier = new FailureClassifier();

  it('should report success for a clean exit with ordinary output', () => {
    expect(
      classifier.classify({ backend: 'claude', taskType: 'build', exitCode: 0, outputText: 'All tasks done.' })
    ).toBe('success');
  });

  it('should report otherFailure for an unrecognised non-zero exit', () => {
    expect(
      classifier.classify({ backend: 'codex', taskType: 'build', exitCode: 2, outputText: 'segfault' })
    ).toBe('otherFailure');
  });

  it('should recognise a claude rate limit payload', () => {
    const outputText = '{"type":"result","error":{"type":"rate_limit_error","message":"slow down"}}';
    expect(classifier.classify({ backend: 'claude', taskType: 'build', exitCode: 1, outputText })).toBe(
      'quotaFailure'
    );
  });

  it('should recognise a codex quota message', () => {
    const outputText = 'ERROR: You exceeded your current quota, please check your plan';
    expect(classifier.classify({ backend: 'codex', taskType: 'plan', exitCode: 1, outputText })).toBe(
      'quotaFailure'
    );
  });

  it('should rank auth above quota', () => {
    const outputText = 'Invalid API Key\nUsage limit reached';
    expect(classifier.classify({ backend: 'claude', taskType: 'build', exitCode: 1, outputText })).toBe(
      'authFailure'
    );
  });

  it('should recognise an expired codex session', () => {
    const outputText = 'Failed to refresh token: 401';
    expect(classifier.classify({ backend: 'codex', taskType: 'plan', exitCode: 1, outputText })).toBe(
      'authFailure'
    );
  });

  it('should only apply schema rules to codex review and security tasks', () => {
    const outputText = 'Invalid schema for response_format "review"';
    expect(classifier.classify({ backend: 'codex', taskType: 'review', exitCode: 1, outputText })).toBe(
      'schemaFailure'
    );
    expect(classifier.classify({ backend: 'codex', taskType: 'security', exitCode: 1, outputText })).toBe(
      'schemaFailure'
    );
    expect(classifier.classify({ backend: 'codex', taskType: 'build', exitCode: 1, outputText })).toBe(
      'otherFailure'
    );
  });

  it('should not apply one backend\'s patterns to the other', () => {
    const outputText = 'Rate limit reached for gpt-5.2';
    expect(classifier.classify({ backend: 'claude', taskType: 'build', exitCode: 1, outputText })).toBe(
      'otherFailure'
    );
  });

  describe('clean exits', () => {
    it('should catch an error payload at the end of the stream', () => {
      const outputText = `${'x'.repeat(5000)}\n{"type":"result","is_error":true,"result":"Usage limit reached"}`;
      expect(classifier.classify({ backend: 'claude', taskType: 'build', exitCode: 0, outputText })).toBe(
        'quotaFailure'
      );
    });

    it('should catch a rate limit error object at the end of the stream', () => {
      const outputText = '{"type":"assistant"}\n{"error":{"type":"rate_limit_error","message":"slow down"}}';
      expect(classifier.classify({ backend: 'claude', taskType: 'build', exitCode: 0, outputText })).toBe(
        'quotaFailure'
      );
    });

    it('should not read failure words in a successful result as a failure', () => {
      const outputText =
        '{"type":"result","subtype":"success","is_error":false,"result":"Fixed the login handler so users no longer get an unauthorized error."}';
      expect(classifier.classify({ backend: 'claude', taskType: 'build', exitCode: 0, outputText })).toBe(
        'success'
      );
    });

    it('should ignore plain output lines that mention a limit', () => {
      const outputText = 'Added a retry for when the API says Usage limit reached';
      expect(classifier.classify({ backend: 'claude', taskType: 'build', exitCode: 0, outputText })).toBe(
        'success'
      );
    });

    it('should still classify plain failure text on a non-zero exit', () => {
      const outputText = 'unauthorized';
      expect(classifier.classify({ backend: 'claude', taskType: 'build', exitCode: 1, outputText })).toBe(
        'authFailure'
      );
    });

    it('should ignore failure text outside the inspected tail', () => {
      const outputText = `{"type":"error","message":"Usage limit reached"}\n${'x'.repeat(3000)}`;
      expect(classifier.classify({ backend: 'claude', taskType: 'build', exitCode: 0, outputText })).toBe(
        'success'
      );
    });

    it('should inspect nothing when the tail size is zero', () => {
      const strict = new FailureClassifier({ successTailChars: 0 });
      expect(
        strict.classify({
          backend: 'claude',
          taskType: 'build',
          exitCode: 0,
          outputText: '{"type":"error","message":"Usage limit reached"}',
        })
      ).toBe('success');
    });
  });

  it('should check extra rules before the built-in ones', () => {
    const custom = new FailureClassifier({
      extraRules: [{ classification: 'authFailure', pattern: /SSO session expired/ }],
    });
    expect(
      custom.classify({ backend: 'codex', taskType: 'build', exitCode: 1, outputText: 'SSO session expired' })
    ).toBe('authFailure');
  });
});
