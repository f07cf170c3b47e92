import { GetParameterCommand } from '@aws-sdk/client-ssm';
import { SsmBase, type SsmBaseProps } from './ssm-base';

export type SsmParametersProps = SsmBaseProps;

export class SsmParameters extends SsmBase {
    constructor(props: SsmParametersProps) {
        super(props);
    }

    /**
     * Reads a parameter from Parameter Store.
     * Errors from SSM (missing parameter, access denied) are passed to the caller as is.
     */
    async getParamValue(name: string, decrypt: boolean): Promise<string> {
        try {
            const response = await this.ssm.send(new GetParameterCommand({ Name: name, WithDecryption: decrypt }));

            return response.Parameter?.Value ?? '';
        } catch (err) {
            this.logger?.warn(this.reqId, 'failed to get ssm parameter', { name, decrypt, err });

            throw err;
        }
    }
}
