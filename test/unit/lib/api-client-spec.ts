import { default as _chai, expect } from 'chai';
import _chaiAsPromised from 'chai-as-promised';
_chai.use(_chaiAsPromised);
import 'mocha';

import { STANDARD_EMAIL_PREFIXES } from '../../../src/consts';
import { FaultError, LoginError } from '../../../src/errors';
import { ApiClient } from '../../../src/lib/api-client';
import { createClock, FakeTransport } from '../../utils/fake-transport';

describe('[api-client]', () => {
    let _transport: FakeTransport;

    function _login(): Promise<ApiClient> {
        return ApiClient.login(
            { username: 'test-user', password: 'test-secret' },
            { transport: _transport, now: createClock() }
        );
    }

    beforeEach(() => {
        _transport = new FakeTransport().returns('login', [
            'test-token',
            { username: 'test-user', web_server: 'Web100' }
        ]);
    });

    describe('login()', () => {
        it('should return a client bound to the new session', async () => {
            const client = await _login();

            expect(client.account).to.deep.equal({
                username: 'test-user',
                web_server: 'Web100'
            });
            expect(client.ledger.session.token).to.equal('test-token');
            expect(client.ledger.transport).to.equal(_transport);
        });

        it('should reject if the login fails', async () => {
            _transport.fails('login', new FaultError(1, 'LoginError'));

            await expect(_login()).to.be.rejectedWith(
                LoginError,
                "Unable to log in as 'test-user': 1, LoginError"
            );
        });
    });

    describe('resource()', () => {
        it('should return one object per resource kind', async () => {
            const client = await _login();

            const mailbox = client.resource('mailbox');

            expect(mailbox.kind).to.equal('mailbox');
            expect(client.resource('mailbox')).to.equal(mailbox);
            expect(client.resource('domain')).to.not.equal(mailbox);
        });

        it('should send calls with the session token', async () => {
            _transport.returns('create_cronjob', true);
            const client = await _login();

            await client.resource('cron').execute('create', {
                line: '0 0 * * * /bin/true'
            });

            expect(_transport.callsTo('create_cronjob')).to.deep.equal([
                ['test-token', '0 0 * * * /bin/true']
            ]);
        });
    });

    describe('createEmails()', () => {
        it('should create one address per prefix', async () => {
            _transport
                .returns('list_emails', [])
                .on('create_email', (params) => ({ email_address: params[1] }));
            const client = await _login();

            await client.createEmails({
                domain: 'example.com',
                prefixes: ['info', 'sales'],
                targets: ['inbox', 'archive']
            });

            expect(_transport.callsTo('create_email')).to.deep.equal([
                ['test-token', 'info@example.com', 'inbox, archive', false, '', '', '', '', ''],
                ['test-token', 'sales@example.com', 'inbox, archive', false, '', '', '', '', '']
            ]);
            expect(client.ledger.counts).to.deep.equal({ success: 2, failure: 0 });
        });

        it('should use the standard prefixes by default', async () => {
            _transport.returns('list_emails', []).returns('create_email', true);
            const client = await _login();

            await client.createEmails({ domain: 'example.com', targets: ['inbox'] });

            const addresses = _transport
                .callsTo('create_email')
                .map((params) => params[1]);
            expect(addresses).to.deep.equal(
                STANDARD_EMAIL_PREFIXES.map((prefix) => `${prefix}@example.com`)
            );
        });

        it('should skip addresses that already exist', async () => {
            _transport
                .returns('list_emails', [
                    { id: 1, email_address: 'sales@example.com', targets: 'inbox' }
                ])
                .returns('create_email', true);
            const client = await _login();

            await client.createEmails({
                domain: 'example.com',
                prefixes: ['info', 'sales'],
                targets: ['inbox']
            });

            expect(
                _transport.callsTo('create_email').map((params) => params[1])
            ).to.deep.equal(['info@example.com']);
            expect(
                client.ledger.getResults('failure').map((result) => result.payload)
            ).to.deep.equal([
                "Can't create email address 'sales@example.com' that already exists."
            ]);
        });
    });

    describe('deleteEmails()', () => {
        it('should delete the addresses that exist', async () => {
            _transport
                .returns('list_emails', [
                    { id: 1, email_address: 'info@example.com', targets: 'inbox' }
                ])
                .returns('delete_email', true);
            const client = await _login();

            await client.deleteEmails({
                domain: 'example.com',
                prefixes: ['info', 'sales']
            });

            expect(_transport.callsTo('delete_email')).to.deep.equal([
                ['test-token', 'info@example.com']
            ]);
            expect(
                client.ledger.getResults('failure').map((result) => result.payload)
            ).to.deep.equal([
                "Can't delete non-existent 'sales@example.com' email address."
            ]);
        });
    });

    describe('getReport()', () => {
        it('should list successes before failures', async () => {
            _transport
                .returns('list_emails', [
                    { id: 1, email_address: 'sales@example.com', targets: 'inbox' }
                ])
                .returns('create_email', { id: 2, email_address: 'info@example.com' });
            const client = await _login();

            await client.createEmails({
                domain: 'example.com',
                prefixes: ['sales', 'info'],
                targets: ['inbox']
            });
            const report = client.getReport({ title: 'Mail setup' });

            expect(report).to.deep.equal({
                title: 'Mail setup',
                entries: [
                    {
                        status: 'success',
                        label: 'CREATE_EMAIL',
                        timestamp: new Date('2024-01-01T00:00:01.000Z'),
                        text: "'2', 'info@example.com'"
                    },
                    {
                        status: 'failure',
                        label: 'CREATE_EMAIL',
                        timestamp: new Date('2024-01-01T00:00:00.000Z'),
                        text: "Can't create email address 'sales@example.com' that already exists."
                    }
                ]
            });
        });
    });

    describe('report()', () => {
        it('should render the results as html list items', async () => {
            _transport.returns('create_cronjob', '');
            const client = await _login();

            await client.resource('cron').execute('create', {
                line: '0 0 * * * /bin/true'
            });
            const lines = client.report({ styles: '' }).split('\n');

            expect(lines).to.include('    <title>WebFaction API Run Results</title>');
            expect(lines.filter((line) => line.includes('<li'))).to.deep.equal([
                '      <li class="success">2024-01-01T00:00:00.000Z | CREATE_CRONJOB | &#39;API returns empty result for this type of call.&#39;</li>'
            ]);
        });
    });
});
