import { emptyExtraction, parseExtractedData } from '../../src/utils/extraction';

describe('parseExtractedData', () => {
  const schema = { name: 'string', phone: 'string' } as const;

  it('should read JSON inside a markdown fence and drop unknown keys', () => {
    const raw = '```json\n{"name": "Ana", "phone": 5511988887777, "extra": "x"}\n```';
    expect(parseExtractedData(raw, schema)).toEqual({ name: 'Ana', phone: '5511988887777' });
  });

  it('should fill missing keys with null', () => {
    expect(parseExtractedData('{"name": "Ana"}', schema)).toEqual({ name: 'Ana', phone: null });
  });

  it('should null out blank, "null" and nested values', () => {
    expect(parseExtractedData('{"name": "  ", "phone": {"ddd": "11"}}', schema)).toEqual({ name: null, phone: null });
    expect(parseExtractedData('{"name": "null", "phone": null}', schema)).toEqual({ name: null, phone: null });
  });

  it('should coerce numbers and booleans by type', () => {
    const typed = { budget: 'number', urgent: 'boolean' } as const;
    expect(parseExtractedData('{"budget": "12,5", "urgent": "true"}', typed)).toEqual({ budget: 12.5, urgent: true });
    expect(parseExtractedData('{"budget": "muito", "urgent": "talvez"}', typed)).toEqual({ budget: null, urgent: null });
  });

  it('should return null for anything that is not a JSON object', () => {
    expect(parseExtractedData('Claro! O nome é Ana.', schema)).toBeNull();
    expect(parseExtractedData('[1, 2]', schema)).toBeNull();
    expect(parseExtractedData('"Ana"', schema)).toBeNull();
  });
});

describe('emptyExtraction', () => {
  it('should map every schema key to null', () => {
    expect(emptyExtraction({ name: 'string', budget: 'number' })).toEqual({ name: null, budget: null });
  });
});
