import { describe, it, expect } from 'vitest';
import { generateOpenApiDocument } from '../openapi/generate.js';

describe('generateOpenApiDocument', () => {
  const doc = generateOpenApiDocument();

  it('produces an OpenAPI 3.1 document', () => {
    expect(doc.openapi).toBe('3.1.0');
    expect(doc.info.title).toBe('Shadebridge Control API');
  });

  it('converts path parameters to OpenAPI syntax', () => {
    expect(Object.keys(doc.paths ?? {})).toContain('/devices/{address}/commands');
  });

  it('uses the route key as operation id', () => {
    expect(doc.paths?.['/scenes/{address}/activate']?.post?.operationId).toBe('scenes.activate');
  });

  it('documents void routes as 204', () => {
    expect(Object.keys(doc.paths?.['/bridge/notices']?.delete?.responses ?? {})).toContain('204');
  });

  it('documents 202 only where a route declares it', () => {
    expect(Object.keys(doc.paths?.['/devices/{address}/commands']?.post?.responses ?? {}).sort()).toEqual([
      '200',
      '202',
      'default',
    ]);
    expect(doc.paths?.['/bridge/discover']?.post?.responses).toMatchObject({
      '202': { description: 'A discovery pass is already running' },
    });
    expect(Object.keys(doc.paths?.['/devices/{address}']?.get?.responses ?? {}).sort()).toEqual(['200', 'default']);
  });
});
