import { describe, expect, it } from 'vitest';
import {
  BadRequestError,
  ClientError,
  getResponseError,
  isClientError,
  isResponseError,
  isServerError,
  NotFoundError,
  ResponseError,
  ServerError,
} from './responseError.js';

const makeResponse = (status: number) => ({
  status,
  headers: new Headers(),
  url: 'https://oauth.example.com/api/v1/me',
  body: '',
});

describe('ResponseError', () => {
  it('defaults the message to the received status', () => {
    const err = new ResponseError(makeResponse(418));

    expect(err.message).toBe('received 418 HTTP response');
    expect(err.response.status).toBe(418);
  });

  it('sets a distinct name per class', () => {
    expect(new BadRequestError(makeResponse(400)).name).toBe('BadRequestError');
    expect(new ServerError(makeResponse(503)).name).toBe('ServerError');
  });

  it('groups 4xx errors under ClientError', () => {
    const err = new NotFoundError(makeResponse(404));

    expect(err).toBeInstanceOf(ClientError);
    expect(isClientError(err)).toBe(true);
    expect(isServerError(err)).toBe(false);
    expect(isResponseError(err)).toBe(true);
  });

  it('getResponseError unwraps nested causes', () => {
    const err = new ServerError(makeResponse(502));
    const wrapped = new Error('outer', { cause: err });

    expect(getResponseError(wrapped)).toBe(err);
    expect(getResponseError(new Error('plain'))).toBeNull();
  });
});
