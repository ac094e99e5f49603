/**
 * Coordinator error tests
 */

import { describe, it, expect } from 'vitest';
import {
  AnalysisError,
  ConfigurationError,
  CoordinatorError,
  ErrorCode,
  ErrorSeverity,
  HostQueryError,
} from '../../../../src/shared/errors/index.js';

describe('CoordinatorError', () => {
  it('should expose code, severity and details in structured form', () => {
    const error = new CoordinatorError('bad state', ErrorCode.UNKNOWN_ERROR, ErrorSeverity.ERROR, { step: 1 });

    expect(error.toStructured()).toMatchObject({
      error: 'bad state',
      code: ErrorCode.UNKNOWN_ERROR,
      severity: ErrorSeverity.ERROR,
      details: { step: 1 },
    });
  });

  it('should give subclasses their fixed severity', () => {
    expect(new HostQueryError('gone').severity).toBe(ErrorSeverity.WARNING);
    expect(new HostQueryError('gone').code).toBe(ErrorCode.HOST_ELEMENT_QUERY_FAILED);
    expect(new AnalysisError('down').code).toBe(ErrorCode.ANALYSIS_FAILED);
    expect(new ConfigurationError('bad').severity).toBe(ErrorSeverity.CRITICAL);
    expect(new ConfigurationError('bad').name).toBe('ConfigurationError');
  });
});
