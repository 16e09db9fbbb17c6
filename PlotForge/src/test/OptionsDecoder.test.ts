import { OptionsDecoder } from '../processor/OptionsDecoder';
import { InvalidOptionsError } from '../errors/PlotErrors';

describe('OptionsDecoder.Decode', () => {
  test('"no options" spellings decode to an empty object', () => {
    expect(OptionsDecoder.Decode('None')).toEqual({});
    expect(OptionsDecoder.Decode('')).toEqual({});
    expect(OptionsDecoder.Decode('   ')).toEqual({});
    expect(OptionsDecoder.Decode('null')).toEqual({});
    expect(OptionsDecoder.Decode(undefined)).toEqual({});
    expect(OptionsDecoder.Decode(null)).toEqual({});
  });

  test('decodes a JSON object', () => {
    expect(OptionsDecoder.Decode('{"x":"a","alpha":0.5}')).toEqual({ x: 'a', alpha: 0.5 });
  });

  test('reports JSON syntax errors', () => {
    expect(() => OptionsDecoder.Decode('{bad')).toThrow(InvalidOptionsError);
    expect(() => OptionsDecoder.Decode('{bad')).toThrow(/^Options are not valid JSON: /);
  });

  test('rejects JSON that is not an object', () => {
    expect(() => OptionsDecoder.Decode('[1,2]')).toThrow('Options must be a JSON object, got array');
    expect(() => OptionsDecoder.Decode('42')).toThrow('Options must be a JSON object, got number');
    expect(() => OptionsDecoder.Decode('"None"')).toThrow('Options must be a JSON object, got string');
  });
});

describe('OptionsDecoder per-kind validation', () => {
  test('line and bar accept x, y, hue and title', () => {
    expect(OptionsDecoder.Cartesian({ x: 'a', y: 'b', hue: 'c', title: 'T' }, 'line')).toEqual({
      x: 'a',
      y: 'b',
      hue: 'c',
      title: 'T',
    });
  });

  test('unrecognised keys are rejected by name', () => {
    expect(() => OptionsDecoder.Cartesian({ x: 'a', color: 'red' }, 'bar')).toThrow(
      new InvalidOptionsError('Unrecognized option for bar plot: color')
    );
    expect(() => OptionsDecoder.Pie({ hue: 'g', s: 3 })).toThrow('Unrecognized options for pie plot: hue, s');
  });

  test('wrong value types name the option', () => {
    expect(() => OptionsDecoder.Cartesian({ x: 5 }, 'line')).toThrow(/^Invalid option 'x' for line plot: /);
  });

  test('worldmap fills defaults', () => {
    expect(OptionsDecoder.WorldMap({})).toEqual({ s: 50, c: 'red', alpha: 0.7, marker: 'o' });
  });

  test('worldmap keeps valid overrides', () => {
    expect(OptionsDecoder.WorldMap({ s: 10, c: '#00ff00', alpha: 0, marker: '^', title: 'Sites' })).toEqual({
      s: 10,
      c: '#00ff00',
      alpha: 0,
      marker: '^',
      title: 'Sites',
    });
  });

  test('worldmap alpha must lie in [0, 1]', () => {
    expect(() => OptionsDecoder.WorldMap({ alpha: 1.5 })).toThrow(
      "Invalid option 'alpha' for worldmap plot: must be between 0 and 1"
    );
    expect(() => OptionsDecoder.WorldMap({ alpha: -0.1 })).toThrow(InvalidOptionsError);
  });

  test('worldmap size must be positive', () => {
    expect(() => OptionsDecoder.WorldMap({ s: 0 })).toThrow("Invalid option 's' for worldmap plot: must be greater than 0");
  });

  test('worldmap rejects unknown markers and malformed colours', () => {
    expect(() => OptionsDecoder.WorldMap({ marker: '*' })).toThrow(/^Invalid option 'marker' for worldmap plot: must be one of o, /);
    expect(() => OptionsDecoder.WorldMap({ c: '#ff000' })).toThrow(/^Invalid option 'c' for worldmap plot/);
  });

  test('worldmap colour must be a CSS name, hex code, rgb() value or shorthand letter', () => {
    expect(() => OptionsDecoder.WorldMap({ c: 'notacolor' })).toThrow(InvalidOptionsError);
    expect(() => OptionsDecoder.WorldMap({ c: 'notacolor' })).toThrow(
      "Invalid option 'c' for worldmap plot: must be a CSS colour name, hex code, rgb() value or one of b, g, r, c, m, y, k, w"
    );
    expect(() => OptionsDecoder.WorldMap({ c: 'x' })).toThrow(InvalidOptionsError);
    expect(() => OptionsDecoder.WorldMap({ c: 'constructor' })).toThrow(InvalidOptionsError);

    expect(OptionsDecoder.WorldMap({ c: 'steelblue' }).c).toBe('steelblue');
    expect(OptionsDecoder.WorldMap({ c: 'SteelBlue' }).c).toBe('SteelBlue');
    expect(OptionsDecoder.WorldMap({ c: 'k' }).c).toBe('k');
    expect(OptionsDecoder.WorldMap({ c: 'rgb(10, 20, 30)' }).c).toBe('rgb(10, 20, 30)');
  });
});
