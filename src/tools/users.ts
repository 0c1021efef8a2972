/**
 * Local user account tools.
 */

import { z } from 'zod';
import {
  CreateUserInputSchema,
  DeleteUserInputSchema,
  ListUsersInputSchema,
  UserPayloadSchema,
  UsernameInputSchema,
  type UserPayload
} from '../schemas/tools.js';
import type { ToolDefinition } from '../types.js';
import { BaseToolGroup, PAGINATION_PARAMETERS } from './base.js';
import { applyPagination } from './format.js';

const UserListSchema = z.array(UserPayloadSchema);

function userSummary(user: UserPayload): Record<string, unknown> {
  return {
    id: user.id,
    uid: user.uid ?? null,
    username: user.username,
    full_name: user.full_name ?? '',
    email: user.email ?? null,
    shell: user.shell ?? null,
    home: user.home ?? null,
    builtin: user.builtin,
    locked: user.locked,
    sudo: user.sudo_commands.length > 0,
    group: user.group?.bsdgrp_group ?? null
  };
}

export class UserTools extends BaseToolGroup {
  readonly groupName = 'user';

  getToolDefinitions(): ToolDefinition[] {
    return [
      this.define('list_users', args => this.listUsers(args), 'List local user accounts', {
        ...PAGINATION_PARAMETERS,
        include_builtin: { type: 'boolean', required: false, description: 'Include built-in system accounts' }
      }),
      this.define('get_user', args => this.getUser(args), 'Get details of a user account', {
        username: { type: 'string', required: true, description: 'Account name' }
      }),
      this.define('create_user', args => this.createUser(args), 'Create a local user account', {
        username: { type: 'string', required: true, description: 'Account name' },
        full_name: { type: 'string', required: true, description: 'Display name' },
        password: { type: 'string', required: false, description: 'Initial password; omit to disable password login' },
        email: { type: 'string', required: false, description: 'Contact address' },
        shell: { type: 'string', required: false, description: 'Login shell (default: /usr/bin/bash)' },
        group_create: { type: 'boolean', required: false, description: 'Create a primary group of the same name' },
        sudo: { type: 'boolean', required: false, description: 'Grant unrestricted sudo' }
      }),
      this.define('delete_user', args => this.deleteUser(args), 'Delete a user account (destructive)', {
        username: { type: 'string', required: true, description: 'Account name' },
        delete_group: { type: 'boolean', required: false, description: 'Also delete the primary group' }
      })
    ];
  }

  async listUsers(args: Record<string, unknown>): Promise<Record<string, unknown>> {
    const { limit, offset, include_builtin } = this.parseArgs(ListUsersInputSchema, args);
    const users = this.parsePayload(UserListSchema, await this.client.get('/user'), '/user');

    const visible = users.filter(user => include_builtin || !user.builtin);
    const page = applyPagination(visible.map(userSummary), limit, offset);

    return {
      success: true,
      users: page.items,
      pagination: page.pagination,
      metadata: {
        builtin_users: users.filter(user => user.builtin).length,
        locked_users: visible.filter(user => user.locked).length,
        sudo_users: visible.filter(user => user.sudo_commands.length > 0).length
      }
    };
  }

  async getUser(args: Record<string, unknown>): Promise<Record<string, unknown>> {
    const { username } = this.parseArgs(UsernameInputSchema, args);
    const user = await this.findUser(username);
    if (!user) {
      return { success: false, error: `User '${username}' not found` };
    }
    return { success: true, user: userSummary(user) };
  }

  async createUser(args: Record<string, unknown>): Promise<Record<string, unknown>> {
    const input = this.parseArgs(CreateUserInputSchema, args);

    const body: Record<string, unknown> = {
      username: input.username,
      full_name: input.full_name,
      shell: input.shell,
      group_create: input.group_create,
      sudo_commands: input.sudo ? ['ALL'] : [],
      password_disabled: input.password === undefined
    };
    if (input.password !== undefined) body.password = input.password;
    if (input.email !== undefined) body.email = input.email;

    const created = await this.client.post('/user', body);

    return {
      success: true,
      message: `User '${input.username}' created successfully`,
      user_id: typeof created === 'number' ? created : null
    };
  }

  async deleteUser(args: Record<string, unknown>): Promise<Record<string, unknown>> {
    const { username, delete_group } = this.parseArgs(DeleteUserInputSchema, args);
    this.requireDestructive('delete_user');

    const user = await this.findUser(username);
    if (!user) {
      return { success: false, error: `User '${username}' not found` };
    }
    if (user.builtin) {
      return { success: false, error: `User '${username}' is built-in and cannot be deleted` };
    }

    await this.client.delete(`/user/id/${user.id}`, { delete_group });

    return { success: true, message: `User '${username}' deleted successfully` };
  }

  private async findUser(username: string): Promise<UserPayload | undefined> {
    const users = this.parsePayload(UserListSchema, await this.client.get('/user', { username }), '/user');
    return users.find(user => user.username === username);
  }
}
