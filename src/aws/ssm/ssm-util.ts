import type { SSMClient } from '@aws-sdk/client-ssm';
import { SsmParameters, type SsmParametersProps } from './ssm-parameters';

export type SsmUtilProps = SsmParametersProps;

export class SsmUtil extends SsmParameters {
    constructor(props: SsmUtilProps) {
        super(props);
    }

    get client(): SSMClient {
        return this.ssm;
    }
}
