import {
  BadRequestException,
  HttpException,
  UnprocessableEntityException,
} from '@nestjs/common';
import { ExtractionError, RenderError } from './errors/quadrant.errors';
import { QuadrantController } from './quadrant.controller';

function captureHttpError(run: () => unknown): HttpException {
  try {
    run();
  } catch (error) {
    if (error instanceof HttpException) {
      return error;
    }
    throw error;
  }
  throw new Error('expected an HttpException');
}

describe('QuadrantController', () => {
  const analysis = {
    analyze: jest.fn(),
    extractInsights: jest.fn(),
  };
  const controller = new QuadrantController(analysis as never);

  const body = {
    text: 'Article text',
    xAxis: { label: 'Value' },
    yAxis: { label: 'Risk', dimension: 'sentiment' },
  };

  beforeEach(() => {
    jest.clearAllMocks();
  });

  it('fills axis defaults before running the analysis', () => {
    analysis.analyze.mockReturnValue({ diagram: { svg: '<svg/>' } });

    controller.analyze(body);

    expect(analysis.analyze).toHaveBeenCalledWith({
      text: 'Article text',
      xAxis: {
        label: 'Value',
        minLabel: 'Low',
        maxLabel: 'High',
        dimension: 'custom',
      },
      yAxis: {
        label: 'Risk',
        minLabel: 'Low',
        maxLabel: 'High',
        dimension: 'sentiment',
      },
    });
  });

  it('returns only the svg markup from analyzeSvg', () => {
    analysis.analyze.mockReturnValue({ diagram: { svg: '<svg/>' } });

    expect(controller.analyzeSvg(body)).toBe('<svg/>');
  });

  it('rejects malformed bodies with the list of issues', () => {
    const error = captureHttpError(() =>
      controller.analyze({ text: 'Article text', yAxis: { label: 'Risk' } }),
    );

    expect(error).toBeInstanceOf(BadRequestException);
    expect(error.getResponse()).toMatchObject({
      statusCode: 400,
      issues: [{ path: 'xAxis', message: 'Required' }],
    });
    expect(analysis.analyze).not.toHaveBeenCalled();
  });

  it('rejects maxInsights above the ceiling', () => {
    const error = captureHttpError(() =>
      controller.extractInsights({ text: 'Article text', maxInsights: 500 }),
    );

    expect(error.getStatus()).toBe(400);
  });

  it('maps extraction errors to 422', () => {
    analysis.extractInsights.mockImplementation(() => {
      throw new ExtractionError(
        'TooShort',
        'text',
        12,
        'text too short for analysis: 12 characters (minimum: 100)',
      );
    });

    const error = captureHttpError(() =>
      controller.extractInsights({ text: 'Article text' }),
    );

    expect(error).toBeInstanceOf(UnprocessableEntityException);
    expect(error.getResponse()).toEqual({
      statusCode: 422,
      error: 'ExtractionError',
      reason: 'TooShort',
      field: 'text',
      value: 12,
      message: 'text too short for analysis: 12 characters (minimum: 100)',
    });
  });

  it('maps render errors to 400', () => {
    analysis.analyze.mockImplementation(() => {
      throw new RenderError('width', 0, 'width must be a positive integer');
    });

    const error = captureHttpError(() => controller.analyze(body));

    expect(error.getStatus()).toBe(400);
    expect(error.getResponse()).toEqual({
      statusCode: 400,
      error: 'RenderError',
      reason: 'InvalidOption',
      field: 'width',
      value: 0,
      message: 'width must be a positive integer',
    });
  });

  it('rethrows unexpected errors untouched', () => {
    const failure = new Error('boom');
    analysis.analyze.mockImplementation(() => {
      throw failure;
    });

    expect(() => controller.analyze(body)).toThrow(failure);
  });
});
