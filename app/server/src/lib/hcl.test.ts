import { describe, it, expect } from 'vitest';
import { ParseError } from './errors';
import { getVariableDefault, parseHcl, setProviderVersions, setVariableAttribute } from './hcl';

const VARIABLES = `variable "app_name" {
  description = "Application name"
  type        = string
  default     = "argo-controller"
}

variable "channel" {
  description = "Charm channel"
  type        = string
  default     = "latest/edge"
}
`;

const VERSIONS = `terraform {
  required_version = ">= 1.5"
  required_providers {
    juju = {
      source  = "juju/juju"
      version = ">= 0.10.0"
    }
  }
}
`;

describe('hcl', () => {
  describe('setVariableAttribute', () => {
    it('should replace the attribute of the named variable only', () => {
      const result = setVariableAttribute(VARIABLES, 'channel', 'default', '3.4/stable');
      expect(result).toBe(VARIABLES.replace('"latest/edge"', '"3.4/stable"'));
    });

    it('should add the attribute when the variable has none', () => {
      const content = `variable "channel" {\n  type = string\n}\n`;
      expect(setVariableAttribute(content, 'channel', 'default', '3.4/stable')).toBe(
        `variable "channel" {\n  type = string\n  default = "3.4/stable"\n}\n`
      );
    });

    it('should keep a trailing comment', () => {
      const content = `variable "channel" {\n  default = "latest/edge" # pinned\n}\n`;
      expect(setVariableAttribute(content, 'channel', 'default', '3.4/stable')).toBe(
        `variable "channel" {\n  default = "3.4/stable" # pinned\n}\n`
      );
    });

    it('should return the content unchanged when the variable is missing', () => {
      expect(setVariableAttribute(VARIABLES, 'revision', 'default', '1')).toBe(VARIABLES);
    });

    it('should refuse to grow a single-line block', () => {
      expect(() =>
        setVariableAttribute('variable "channel" { type = string }\n', 'channel', 'default', 'x')
      ).toThrow(ParseError);
    });
  });

  describe('setProviderVersions', () => {
    it('should rewrite required_version and declared providers', () => {
      const result = setProviderVersions(VERSIONS, {
        requiredVersion: '>= 1.6',
        providers: { juju: '>= 0.14.0', aws: '~> 5.0' },
      });
      expect(result).toBe(
        VERSIONS.replace('">= 1.5"', '">= 1.6"').replace('">= 0.10.0"', '">= 0.14.0"')
      );
    });

    it('should add missing version attributes', () => {
      const content = `terraform {
  required_providers {
    juju = {
      source = "juju/juju"
    }
  }
}
`;
      expect(
        setProviderVersions(content, { requiredVersion: '>= 1.6', providers: { juju: '>= 0.14.0' } })
      ).toBe(`terraform {
  required_providers {
    juju = {
      source = "juju/juju"
      version = ">= 0.14.0"
    }
  }
  required_version = ">= 1.6"
}
`);
    });

    it('should leave documents without a terraform block alone', () => {
      expect(setProviderVersions(VARIABLES, { requiredVersion: '>= 1.6' })).toBe(VARIABLES);
    });
  });

  describe('getVariableDefault', () => {
    it('should read the default of a variable', async () => {
      await expect(getVariableDefault('variables.tf', VARIABLES, 'channel')).resolves.toBe('latest/edge');
    });

    it('should return undefined for unknown variables', async () => {
      await expect(getVariableDefault('variables.tf', VARIABLES, 'revision')).resolves.toBeUndefined();
    });
  });

  describe('parseHcl', () => {
    it('should reject malformed documents with a ParseError', async () => {
      await expect(parseHcl('broken.tf', 'variable "channel" {\n')).rejects.toThrow(ParseError);
    });
  });
});
