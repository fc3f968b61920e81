import { SourcePosition } from './SourcePosition';

describe('SourcePosition', () => {
  const text = 'int main() {\n    pri\n}';

  describe('parse', () => {
    it('should parse a valid position string', () => {
      const position = SourcePosition.parse('2:8');
      expect(position.line).toBe(2);
      expect(position.column).toBe(8);
    });

    it('should throw an error for a position with missing parts', () => {
      expect(() => SourcePosition.parse('2')).toThrow('Invalid position');
      expect(() => SourcePosition.parse('1:2:3')).toThrow('Invalid position');
    });

    it('should throw an error for non-numeric or non-positive parts', () => {
      expect(() => SourcePosition.parse('two:8')).toThrow('Invalid position');
      expect(() => SourcePosition.parse('0:1')).toThrow('Invalid position');
      expect(() => SourcePosition.parse('1:0')).toThrow('Invalid position');
    });
  });

  describe('toOffset', () => {
    it('should count each newline as one character', () => {
      expect(new SourcePosition(1, 1).toOffset(text)).toBe(0);
      expect(new SourcePosition(2, 8).toOffset(text)).toBe(20);
      expect(new SourcePosition(3, 2).toOffset(text)).toBe(22);
    });

    it('should clamp a column past the end of the line', () => {
      expect(new SourcePosition(2, 99).toOffset(text)).toBe(20);
    });

    it('should throw for a line past the end of the document', () => {
      expect(() => new SourcePosition(4, 1).toOffset(text)).toThrow('Invalid position: 4:1');
    });
  });

  describe('fromOffset', () => {
    it('should convert offsets back to line and column', () => {
      expect(SourcePosition.fromOffset(text, 0).toString()).toBe('1:1');
      expect(SourcePosition.fromOffset(text, 13).toString()).toBe('2:1');
      expect(SourcePosition.fromOffset(text, 20).toString()).toBe('2:8');
    });
  });

  describe('equals', () => {
    it('should compare line and column', () => {
      expect(new SourcePosition(2, 8).equals(SourcePosition.parse('2:8'))).toBe(true);
      expect(new SourcePosition(2, 8).equals(new SourcePosition(2, 9))).toBe(false);
    });
  });
});
