import { PlotService } from '../processor/PlotService';
import { InvalidOptionsError, MalformedInputError, UnsupportedPlotKindError } from '../errors/PlotErrors';
import { ErrorHelper } from '../utils/ErrorHelper';
import { LogHelper } from '../utils/LogHelper';

describe('PlotService.GeneratePlot', () => {
  afterEach(() => {
    jest.restoreAllMocks();
  });

  test('returns the status message and a base64 PNG', () => {
    const info = jest.spyOn(LogHelper, 'Info').mockImplementation(() => undefined);

    const result = PlotService.GeneratePlot('a,b\n1,2\n2,4\n3,6', 'line', '{"x":"a","y":"b"}');

    expect(result.message).toBe('Plot generated successfully');
    expect(result.image.mimeType).toBe('image/png');
    const png = Buffer.from(result.image.data, 'base64');
    expect(png.length).toBe(result.sizeBytes);
    expect(png.subarray(1, 4).toString('ascii')).toBe('PNG');
    expect(info).toHaveBeenCalledWith(
      'Plot generated successfully',
      expect.objectContaining({ plot_type: 'line', options: ['x', 'y'], rows: 3 })
    );
  });

  test('checks the kind, then the options, then the CSV', () => {
    jest.spyOn(ErrorHelper, 'LogError').mockImplementation(() => undefined);
    expect(() => PlotService.GeneratePlot('', 'scatter', '{bad')).toThrow(UnsupportedPlotKindError);
    expect(() => PlotService.GeneratePlot('', 'line', '{bad')).toThrow(InvalidOptionsError);
    expect(() => PlotService.GeneratePlot('', 'line', 'None')).toThrow(MalformedInputError);
  });

  test('logs failures before rethrowing them', () => {
    const logError = jest.spyOn(ErrorHelper, 'LogError').mockImplementation(() => undefined);
    expect(() => PlotService.GeneratePlot('f,c\na,-1', 'pie', 'None')).toThrow(
      "Pie slices cannot be zero or negative: column 'c' row 1"
    );
    expect(logError).toHaveBeenCalledTimes(1);
    expect(logError.mock.calls[0][1]).toBe('Error generating plot');
  });
});
