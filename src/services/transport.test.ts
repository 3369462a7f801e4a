import { describe, expect, it, vi } from 'vitest'
import { jsonResponse, silentLogger } from '../test/helpers'
import { InvalidArgumentError, isRedfishError, OperationFailedError, TimeoutError, UnexpectedContentTypeError } from './errors'
import { type FetchLike, RedfishTransport } from './transport'

function createTransport(fetch: FetchLike, verifyTls?: boolean): RedfishTransport {
  return new RedfishTransport({
    host: 'bmc.test',
    username: 'root',
    password: 'test-secret',
    verifyTls,
    fetch,
    logger: silentLogger,
  })
}

describe('RedfishTransport', () => {
  it('sends basic credentials and JSON headers to the controller origin', async () => {
    const fetchMock = vi.fn<FetchLike>().mockResolvedValue(jsonResponse({ Name: 'Root' }))
    const transport = createTransport(fetchMock)

    const result = await transport.fetch('/redfish/v1')

    expect(result).toEqual({ Name: 'Root', _location: '' })
    const [url, init] = fetchMock.mock.calls[0]
    expect(url).toBe('https://bmc.test/redfish/v1')
    expect(init.method).toBe('GET')
    expect(init.headers.Authorization).toBe(`Basic ${Buffer.from('root:test-secret').toString('base64')}`)
    expect(init.headers['Content-Type']).toBe('application/json')
    expect(init.body).toBeUndefined()
    expect(init.dispatcher).toBeUndefined()
  })

  it('uses a non-verifying dispatcher when TLS verification is off', async () => {
    const fetchMock = vi.fn<FetchLike>().mockResolvedValue(jsonResponse({}))
    const transport = createTransport(fetchMock, false)

    await transport.fetch('/redfish/v1')

    expect(fetchMock.mock.calls[0][1].dispatcher).toBeDefined()
  })

  it('refuses fully qualified urls without touching the network', async () => {
    const fetchMock = vi.fn<FetchLike>()
    const transport = createTransport(fetchMock)

    await expect(transport.fetch('https://elsewhere.test/redfish/v1')).rejects.toBeInstanceOf(InvalidArgumentError)
    expect(fetchMock).not.toHaveBeenCalled()
  })

  it('posts the payload as JSON and exposes the Location header', async () => {
    const fetchMock = vi.fn<FetchLike>().mockResolvedValue(
      new Response(null, {
        status: 202,
        headers: { Location: '/redfish/v1/Managers/iDRAC.Embedded.1/Jobs/JID_100' },
      }),
    )
    const transport = createTransport(fetchMock)

    const result = await transport.invoke('/redfish/v1/Actions/Volume.Initialize', { InitializeType: 'Fast' })

    expect(result).toEqual({ _location: '/redfish/v1/Managers/iDRAC.Embedded.1/Jobs/JID_100' })
    const [, init] = fetchMock.mock.calls[0]
    expect(init.method).toBe('POST')
    expect(init.body).toBe('{"InitializeType":"Fast"}')
  })

  it('reports a request that outlives its timeout as a timeout', async () => {
    const fetchMock = vi.fn<FetchLike>(
      (_url, init) =>
        new Promise((_resolve, reject) => {
          init.signal?.addEventListener('abort', () => reject(init.signal?.reason))
        }),
    )
    const transport = new RedfishTransport({
      host: 'bmc.test',
      username: 'root',
      password: 'test-secret',
      requestTimeoutMs: 20,
      fetch: fetchMock,
      logger: silentLogger,
    })

    const error = await transport.fetch('/redfish/v1/Systems').catch((caught: unknown) => caught)

    expect(error).toBeInstanceOf(TimeoutError)
    expect(isRedfishError(error) && error.kind).toBe('Timeout')
    expect((error as TimeoutError).message).toBe('GET /redfish/v1/Systems timed out after 20ms')
    expect((error as TimeoutError).cause).toBeInstanceOf(Error)
  })

  it('decodes a 204 response to an empty result', async () => {
    const fetchMock = vi.fn<FetchLike>().mockResolvedValue(new Response(null, { status: 204 }))
    const transport = createTransport(fetchMock)

    await expect(transport.invoke('/redfish/v1/Actions/Manager.Reset', {})).resolves.toEqual({ _location: '' })
  })

  it('rejects non-JSON bodies on success', async () => {
    const fetchMock = vi.fn<FetchLike>().mockResolvedValue(
      new Response('<html></html>', { status: 200, headers: { 'Content-Type': 'text/html; charset=utf-8' } }),
    )
    const transport = createTransport(fetchMock)

    const error = await transport.fetch('/redfish/v1').catch((caught: unknown) => caught)

    expect(error).toBeInstanceOf(UnexpectedContentTypeError)
    expect((error as UnexpectedContentTypeError).contentType).toBe('text/html; charset=utf-8')
  })

  it('accepts JSON content types with parameters', async () => {
    const fetchMock = vi.fn<FetchLike>().mockResolvedValue(
      new Response('{"Id":"1"}', { status: 200, headers: { 'Content-Type': 'application/json;odata.metadata=minimal' } }),
    )
    const transport = createTransport(fetchMock)

    await expect(transport.fetch('/redfish/v1/Systems/1')).resolves.toEqual({ Id: '1', _location: '' })
  })

  it('surfaces the extended error messages of a failed request in server order', async () => {
    const fetchMock = vi.fn<FetchLike>().mockResolvedValue(
      jsonResponse(
        {
          error: {
            code: 'Base.1.8.GeneralError',
            '@Message.ExtendedInfo': [
              { MessageId: 'IDRAC.2.8.SYS011', Message: 'Pending configuration values are already committed.' },
              { MessageId: 'Base.1.8.ActionNotSupported', Message: 'The action is not supported.' },
            ],
          },
        },
        { status: 400 },
      ),
    )
    const transport = createTransport(fetchMock)

    const error = await transport.invoke('/redfish/v1/Actions/Test', {}).catch((caught: unknown) => caught)

    expect(error).toBeInstanceOf(OperationFailedError)
    const failure = error as OperationFailedError
    expect(failure.status).toBe(400)
    expect(failure.method).toBe('POST')
    expect(failure.path).toBe('/redfish/v1/Actions/Test')
    expect(failure.errors).toEqual([
      { messageId: 'IDRAC.2.8.SYS011', message: 'Pending configuration values are already committed.' },
      { messageId: 'Base.1.8.ActionNotSupported', message: 'The action is not supported.' },
    ])
  })

  it('reports an empty error list when the failure body is missing or not JSON', async () => {
    const fetchMock = vi
      .fn<FetchLike>()
      .mockResolvedValueOnce(new Response('', { status: 500 }))
      .mockResolvedValueOnce(new Response('Service Unavailable', { status: 503 }))
    const transport = createTransport(fetchMock)

    const first = await transport.fetch('/redfish/v1').catch((caught: unknown) => caught)
    const second = await transport.fetch('/redfish/v1').catch((caught: unknown) => caught)

    expect((first as OperationFailedError).errors).toEqual([])
    expect((second as OperationFailedError).errors).toEqual([])
    expect((second as OperationFailedError).message).toBe('GET /redfish/v1 failed with status 503')
  })
})
