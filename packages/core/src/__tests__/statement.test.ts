import { createStatement } from '../types/statement';

describe('createStatement', () => {
  it('should default to no parameters', () => {
    expect(createStatement('RETURN 1')).toEqual({ text: 'RETURN 1', parameters: {} });
  });

  it('should copy and freeze the parameters', () => {
    const parameters: Record<string, unknown> = { name: 'Ada' };
    const statement = createStatement('MATCH (p {name: $name}) RETURN p', parameters);
    parameters.name = 'Grace';

    expect(statement.parameters).toEqual({ name: 'Ada' });
    expect(Object.isFrozen(statement)).toBe(true);
    expect(Object.isFrozen(statement.parameters)).toBe(true);
  });
});
