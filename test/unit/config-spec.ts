import { expect } from 'chai';
import 'mocha';

import { getConfig } from '../../src/config';
import { API_URL } from '../../src/consts';

describe('[config]', () => {
    describe('getConfig()', () => {
        it('should return defaults for an empty environment', () => {
            expect(getConfig({})).to.deep.equal({
                apiUrl: API_URL,
                timeout: undefined,
                logLevel: 'error'
            });
        });

        it('should read settings from the environment', () => {
            expect(
                getConfig({
                    WF_API_URL: 'http://localhost:8080/',
                    WF_API_TIMEOUT: '5000',
                    LOG_LEVEL: 'debug'
                })
            ).to.deep.equal({
                apiUrl: 'http://localhost:8080/',
                timeout: 5000,
                logLevel: 'debug'
            });
        });

        it('should treat empty values as unset', () => {
            expect(getConfig({ WF_API_URL: '', LOG_LEVEL: '' })).to.deep.include({
                apiUrl: API_URL,
                logLevel: 'error'
            });
        });

        it('should throw an error if the timeout is not a positive number', () => {
            expect(() => getConfig({ WF_API_TIMEOUT: '-1' })).to.throw(
                Error,
                'Invalid configuration: WF_API_TIMEOUT'
            );
            expect(() => getConfig({ WF_API_TIMEOUT: 'soon' })).to.throw(
                Error,
                'Invalid configuration: WF_API_TIMEOUT'
            );
        });

        it('should throw an error if the log level is unknown', () => {
            expect(() => getConfig({ LOG_LEVEL: 'loud' })).to.throw(
                Error,
                'Invalid configuration: LOG_LEVEL'
            );
        });
    });
});
