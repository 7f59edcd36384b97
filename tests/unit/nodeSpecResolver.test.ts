import { test, describe } from 'node:test';
import { resolveNodeSpec, totalNodeCount } from '../../src/services/NodeSpecResolver.js';
import { ConfigurationError } from '../../src/errors.js';
import { TestAssertions } from '../fixtures/testAssertions.js';

describe('resolveNodeSpec', () => {
  test('should turn a bare count into default-OS nodes', () => {
    TestAssertions.assertDeepEqual(resolveNodeSpec({ numNodes: 3 }), { linux: 3 });
  });

  test('should accept a mapping of supported operating systems', () => {
    TestAssertions.assertDeepEqual(
      resolveNodeSpec({ nodeSpec: { linux: 2, windows: 1 } }),
      { linux: 2, windows: 1 }
    );
  });

  test('should prefer the mapping when both are given', () => {
    TestAssertions.assertDeepEqual(
      resolveNodeSpec({ numNodes: 5, nodeSpec: { windows: 1 } }),
      { windows: 1 }
    );
  });

  test('should reject a request with neither count nor mapping', () => {
    TestAssertions.assertThrowsError(() => resolveNodeSpec({}), ConfigurationError);
    TestAssertions.assertThrowsError(() => resolveNodeSpec({ numNodes: 0 }), ConfigurationError);
  });

  test('should name the unsupported key and the supported set', () => {
    const error = TestAssertions.assertThrowsError(
      () => resolveNodeSpec({ nodeSpec: { linux: 1, solaris: 2 } }),
      ConfigurationError
    );

    TestAssertions.assertStringContains(error.message, "'solaris' is unknown");
    TestAssertions.assertStringContains(error.message, 'supported operating system: linux, windows');
  });

  test('should reject empty mappings and non-positive counts', () => {
    TestAssertions.assertThrowsError(() => resolveNodeSpec({ nodeSpec: {} }), ConfigurationError);
    TestAssertions.assertThrowsError(() => resolveNodeSpec({ nodeSpec: { linux: 0 } }), ConfigurationError);
    TestAssertions.assertThrowsError(() => resolveNodeSpec({ nodeSpec: { linux: 1.5 } }), ConfigurationError);
    TestAssertions.assertThrowsError(() => resolveNodeSpec({ numNodes: -2 }), ConfigurationError);
  });
});

describe('totalNodeCount', () => {
  test('should sum every OS count', () => {
    TestAssertions.assertEqual(totalNodeCount({ linux: 2, windows: 3 }), 5);
    TestAssertions.assertEqual(totalNodeCount({}), 0);
  });
});
