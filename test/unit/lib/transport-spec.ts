import { default as _chai, expect } from 'chai';
import _chaiAsPromised from 'chai-as-promised';
_chai.use(_chaiAsPromised);
import 'mocha';

import { createServer, IncomingMessage, Server, ServerResponse } from 'http';

import { FaultError, TransportError } from '../../../src/errors';
import {
    classifyError,
    toRpcValue,
    XmlRpcTransport
} from '../../../src/lib/transport';

describe('[transport]', () => {
    describe('toRpcValue()', () => {
        it('should keep scalars and dates', () => {
            const date = new Date('2024-01-01T00:00:00.000Z');

            expect(toRpcValue('a')).to.equal('a');
            expect(toRpcValue(1)).to.equal(1);
            expect(toRpcValue(false)).to.equal(false);
            expect(toRpcValue(date)).to.equal(date);
        });

        it('should map missing values to null', () => {
            expect(toRpcValue(undefined)).to.be.null;
            expect(toRpcValue(null)).to.be.null;
        });

        it('should encode binary values as base64', () => {
            expect(toRpcValue(Buffer.from('hello'))).to.equal('aGVsbG8=');
        });

        it('should convert nested lists and records', () => {
            expect(
                toRpcValue([{ id: 1, tags: ['a', undefined] }, Buffer.from('a')])
            ).to.deep.equal([{ id: 1, tags: ['a', null] }, 'YQ==']);
        });
    });

    describe('classifyError()', () => {
        const url = 'https://api.example.test/';

        it('should map remote faults to fault errors', () => {
            const error = Object.assign(new Error('XML-RPC fault: No such user'), {
                faultCode: 2,
                faultString: 'No such user'
            });

            const result = classifyError(url, error);

            expect(result).to.be.an.instanceof(FaultError);
            expect(result.message).to.equal('2, No such user');
        });

        it('should use the http status code when a response was received', () => {
            const error = Object.assign(new Error('Not Found'), {
                res: { statusCode: 404 }
            });

            const result = classifyError(url, error);

            expect(result).to.be.an.instanceof(TransportError);
            expect(result).to.deep.include({ url, code: 404, message: 'Not Found' });
        });

        it('should use the system error code for network failures', () => {
            const error = Object.assign(new Error('connect ECONNREFUSED'), {
                code: 'ECONNREFUSED'
            });

            const result = classifyError(url, error);

            expect(result).to.be.an.instanceof(TransportError);
            expect(result).to.deep.include({
                url,
                code: 'ECONNREFUSED',
                message: 'connect ECONNREFUSED'
            });
        });

        it('should fall back to an unknown code', () => {
            expect(classifyError(url, 'boom')).to.deep.include({
                code: 'UNKNOWN',
                message: 'boom'
            });
            expect(classifyError(url, new Error('odd'))).to.deep.include({
                code: 'UNKNOWN',
                message: 'odd'
            });
        });
    });

    describe('XmlRpcTransport', () => {
        type Responder = (body: string, res: ServerResponse) => void;

        let _server: Server;
        let _url: string;
        let _requests: string[];
        let _responder: Responder;

        function _sendXml(res: ServerResponse, xml: string): void {
            res.writeHead(200, { 'Content-Type': 'text/xml' });
            res.end(`<?xml version="1.0"?>${xml}`);
        }

        function _countConnections(): Promise<number> {
            return new Promise((resolve, reject) => {
                _server.getConnections((err, count) =>
                    err ? reject(err) : resolve(count)
                );
            });
        }

        async function _waitForConnections(expected: number): Promise<number> {
            let count = await _countConnections();
            for (let attempt = 0; attempt < 50 && count !== expected; attempt++) {
                await new Promise((resolve) => setTimeout(resolve, 10));
                count = await _countConnections();
            }
            return count;
        }

        beforeEach((done) => {
            _requests = [];
            _responder = () => undefined;
            _server = createServer((req: IncomingMessage, res: ServerResponse) => {
                const chunks: Buffer[] = [];
                req.on('data', (chunk: Buffer) => chunks.push(chunk));
                req.on('end', () => {
                    const body = Buffer.concat(chunks).toString('utf8');
                    _requests.push(body);
                    _responder(body, res);
                });
            });
            _server.listen(0, '127.0.0.1', () => {
                const address = _server.address();
                if (address === null || typeof address === 'string') {
                    done(new Error('Test server has no port'));
                    return;
                }
                _url = `http://127.0.0.1:${address.port}/`;
                done();
            });
        });

        afterEach((done) => {
            _server.closeAllConnections();
            _server.close(() => done());
        });

        it('should expose the endpoint url', () => {
            expect(new XmlRpcTransport(_url).url).to.equal(_url);
        });

        it('should send the method name and parameters', async () => {
            _responder = (_body, res) =>
                _sendXml(
                    res,
                    '<methodResponse><params><param><value><boolean>1</boolean></value></param></params></methodResponse>'
                );

            const result = await new XmlRpcTransport(_url).call('delete_mailbox', [
                'test-token',
                'inbox'
            ]);

            expect(result).to.equal(true);
            expect(_requests).to.have.length(1);
            expect(_requests[0]).to.contain('<methodName>delete_mailbox</methodName>');
            expect(_requests[0]).to.contain('<string>inbox</string>');
        });

        it('should resolve with the deserialized response', async () => {
            _responder = (_body, res) =>
                _sendXml(
                    res,
                    '<methodResponse><params><param><value><array><data>' +
                        '<value><struct><member><name>mailbox</name><value><string>inbox</string></value></member>' +
                        '<member><name>id</name><value><int>3</int></value></member></struct></value>' +
                        '</data></array></value></param></params></methodResponse>'
                );

            const result = await new XmlRpcTransport(_url).call('list_mailboxes', [
                'test-token'
            ]);

            expect(result).to.deep.equal([{ mailbox: 'inbox', id: 3 }]);
        });

        it('should reject with a fault error when the service signals a fault', async () => {
            _responder = (_body, res) =>
                _sendXml(
                    res,
                    '<methodResponse><fault><value><struct>' +
                        '<member><name>faultCode</name><value><int>4</int></value></member>' +
                        '<member><name>faultString</name><value><string>Too many parameters</string></value></member>' +
                        '</struct></value></fault></methodResponse>'
                );

            await expect(
                new XmlRpcTransport(_url).call('create_mailbox', ['test-token'])
            ).to.be.rejectedWith(FaultError, '4, Too many parameters');
        });

        it('should reject with a transport error when no response arrives in time', async () => {
            await expect(
                new XmlRpcTransport(_url, { timeout: 50 }).call('list_mailboxes', [
                    'test-token'
                ])
            ).to.be.rejectedWith(TransportError, 'No response after 50ms');
        });

        it('should close the connection of a call that timed out', async () => {
            await expect(
                new XmlRpcTransport(_url, { timeout: 50 }).call('list_mailboxes', [
                    'test-token'
                ])
            ).to.be.rejectedWith(TransportError);

            expect(await _waitForConnections(0)).to.equal(0);
        });

        it('should accept further calls after a call timed out', async () => {
            const transport = new XmlRpcTransport(_url, { timeout: 200 });
            await expect(
                transport.call('list_mailboxes', ['test-token'])
            ).to.be.rejectedWith(TransportError, 'No response after 200ms');

            _responder = (_body, res) =>
                _sendXml(
                    res,
                    '<methodResponse><params><param><value><string>ok</string></value></param></params></methodResponse>'
                );

            expect(await transport.call('system', ['test-token'])).to.equal('ok');
        });
    });
});
