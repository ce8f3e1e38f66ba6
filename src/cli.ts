#!/usr/bin/env node

/**
 * Operator CLI for the restaurant order store
 */

import { Command } from 'commander';
import chalk from 'chalk';
import { RestaurantOrderSystem } from './index';
import { type OrderFailure, type OrderResult, type OrderStatus, type OrderSuccess, ORDER_STATUSES } from './types/order';
import type { OrderDetail } from './types/database';
import { isOrderStatus } from './services/order-state-machine';
import { DataValidator } from './utils/validator';
import { ValidationError } from './utils/error-handler';
import { Logger } from './utils/logger';

function formatCents(cents: number): string {
  return `$${(cents / 100).toFixed(2)}`;
}

interface AccountOptions {
  first: string;
  last: string;
}

interface BillingOptions extends AccountOptions {
  address: string;
  cardNumber: string;
  cardExpiry: string;
  cardCode: string;
  password?: string;
}

interface TransitionOptions {
  user: string;
  restaurant?: string;
}

class RestaurantOrdersCLI {
  private logger = new Logger('RestaurantOrdersCLI');

  /**
   * Open the configured store, run `task`, and always close the store again
   */
  async run(task: (system: RestaurantOrderSystem) => Promise<void>): Promise<void> {
    let system: RestaurantOrderSystem | undefined;
    try {
      system = await RestaurantOrderSystem.open();
      await task(system);
    } catch (error) {
      if (error instanceof ValidationError) {
        console.log(chalk.red(`❌ ${error.message}`));
      } else {
        this.logger.error('Command failed:', error);
        console.log(chalk.red(`❌ ${error instanceof Error ? error.message : String(error)}`));
      }
      process.exitCode = 1;
    } finally {
      await system?.close();
    }
  }

  /**
   * Print a refusal and mark the process as failed; returns true when `result` succeeded
   */
  report<T>(result: OrderResult<T>, success: (value: T) => string): result is OrderSuccess<T> {
    if (result.ok) {
      console.log(chalk.green(`✅ ${success(result.value)}`));
      return true;
    }
    this.printFailure(result);
    return false;
  }

  printFailure(failure: OrderFailure): void {
    console.log(chalk.red(`❌ ${failure.kind}: ${failure.message}`));
    process.exitCode = 1;
  }

  parseStatus(raw: string): OrderStatus {
    const status = raw.trim().toUpperCase();
    if (!isOrderStatus(status)) {
      throw new ValidationError(`Status must be one of ${ORDER_STATUSES.join(', ')}`, 'status');
    }
    return status;
  }

  printOrder(order: OrderDetail): void {
    console.log(`\n📦 Order ${order.id} at ${order.restaurantName ?? `restaurant ${order.restaurantId}`}\n`);
    console.log(`  Customer: ${order.username}`);
    console.log(`  Created:  ${new Date(order.createdAt).toLocaleString()}`);
    console.log(`  Status:   ${chalk.bold(order.status)}`);

    if (order.status === 'PENDING') {
      console.log('\nCart:');
      console.table(order.items.map(item => ({
        ID: item.itemId,
        Item: item.name,
        Price: formatCents(item.price),
        Quantity: item.quantity
      })));
      return;
    }

    console.log(`  Address:  ${order.address}`);
    console.log(`  Total:    ${formatCents(order.total)}`);
    console.log('\nItems:');
    console.table(order.items
      .filter(item => item.quantity > 0)
      .map(item => ({ ID: item.itemId, Item: item.name ?? '(removed)', Quantity: item.quantity })));
  }
}

const cli = new RestaurantOrdersCLI();
const program = new Command();

program
  .name('restaurant-orders')
  .description('Manage restaurants, menus and the order lifecycle')
  .version('1.0.0');

program
  .command('init-db')
  .description('Create the database tables if they do not exist')
  .action(async () => {
    await cli.run(async () => {
      console.log(chalk.green('✅ Database ready'));
    });
  });

program
  .command('create-account <username> <password>')
  .description('Create a customer account')
  .requiredOption('--first <name>', 'First name')
  .requiredOption('--last <name>', 'Last name')
  .action(async (username: string, password: string, options: AccountOptions) => {
    await cli.run(async system => {
      const created = await system.catalog.createAccount(
        DataValidator.validateUsername(username),
        DataValidator.validatePassword(password),
        DataValidator.validateName(options.first, 'firstName'),
        DataValidator.validateName(options.last, 'lastName')
      );
      if (created) {
        console.log(chalk.green(`✅ Account ${username} created`));
      } else {
        console.log(chalk.red('❌ Username already exists'));
        process.exitCode = 1;
      }
    });
  });

program
  .command('update-account <username>')
  .description('Set names, address and card details used when paying')
  .requiredOption('--first <name>', 'First name')
  .requiredOption('--last <name>', 'Last name')
  .requiredOption('--address <address>', 'Delivery address')
  .requiredOption('--card-number <number>', 'Card number')
  .requiredOption('--card-expiry <MM/YY>', 'Card expiry')
  .requiredOption('--card-code <code>', 'Card security code')
  .option('--password <password>', 'New password')
  .action(async (username: string, options: BillingOptions) => {
    await cli.run(async system => {
      const result = await system.catalog.updateAccount(
        username,
        {
          firstName: DataValidator.validateName(options.first, 'firstName'),
          lastName: DataValidator.validateName(options.last, 'lastName'),
          address: DataValidator.validateAddress(options.address),
          cardNumber: DataValidator.validateCardNumber(options.cardNumber),
          cardExpiry: DataValidator.validateCardExpiry(options.cardExpiry),
          cardCode: DataValidator.validateCardCode(options.cardCode)
        },
        options.password === undefined ? undefined : DataValidator.validatePassword(options.password)
      );
      cli.report(result, () => `Account ${username} updated`);
    });
  });

program
  .command('create-restaurant <name>')
  .description('Create a restaurant; the owner becomes its first employee')
  .requiredOption('-o, --owner <username>', 'Owner username')
  .action(async (name: string, options: { owner: string }) => {
    await cli.run(async system => {
      const id = await system.catalog.createRestaurant(DataValidator.validateName(name, 'restaurantName'), options.owner);
      console.log(chalk.green(`✅ Restaurant ${id} created`));
    });
  });

program
  .command('delete-restaurant <restaurantId>')
  .description('Soft-delete a restaurant')
  .action(async (restaurantId: string) => {
    await cli.run(async system => {
      const id = DataValidator.parseId(restaurantId, 'restaurantId');
      cli.report(await system.catalog.deleteRestaurant(id), () => `Restaurant ${id} deleted`);
    });
  });

program
  .command('add-employee <restaurantId> <username>')
  .description('Allow a user to manage orders for a restaurant')
  .action(async (restaurantId: string, username: string) => {
    await cli.run(async system => {
      const id = DataValidator.parseId(restaurantId, 'restaurantId');
      cli.report(await system.catalog.addEmployee(id, username), () => `${username} now works at restaurant ${id}`);
    });
  });

program
  .command('remove-employee <restaurantId> <username>')
  .description('Revoke a user\'s order management rights for a restaurant')
  .action(async (restaurantId: string, username: string) => {
    await cli.run(async system => {
      const id = DataValidator.parseId(restaurantId, 'restaurantId');
      const removed = await system.catalog.removeEmployee(id, username);
      console.log(removed ? chalk.green(`✅ ${username} removed`) : chalk.yellow(`⚠️  ${username} was not an employee`));
    });
  });

program
  .command('add-item <restaurantId> <name> <price>')
  .description('Add a menu item (price like 3.45 or $3.45)')
  .action(async (restaurantId: string, name: string, price: string) => {
    await cli.run(async system => {
      const result = await system.catalog.addMenuItem(
        DataValidator.parseId(restaurantId, 'restaurantId'),
        DataValidator.validateName(name, 'itemName'),
        DataValidator.parsePrice(price)
      );
      cli.report(result, itemId => `Menu item ${itemId} added`);
    });
  });

program
  .command('update-item <restaurantId> <itemId> <name> <price>')
  .description('Rename or reprice a menu item')
  .action(async (restaurantId: string, itemId: string, name: string, price: string) => {
    await cli.run(async system => {
      const result = await system.catalog.updateMenuItem(
        DataValidator.parseId(restaurantId, 'restaurantId'),
        DataValidator.parseId(itemId, 'itemId'),
        DataValidator.validateName(name, 'itemName'),
        DataValidator.parsePrice(price)
      );
      cli.report(result, () => `Menu item ${itemId} updated`);
    });
  });

program
  .command('delete-item <restaurantId> <itemId>')
  .description('Soft-delete a menu item')
  .action(async (restaurantId: string, itemId: string) => {
    await cli.run(async system => {
      const result = await system.catalog.deleteMenuItem(
        DataValidator.parseId(restaurantId, 'restaurantId'),
        DataValidator.parseId(itemId, 'itemId')
      );
      cli.report(result, () => `Menu item ${itemId} deleted`);
    });
  });

program
  .command('restaurants')
  .description('List restaurants')
  .action(async () => {
    await cli.run(async system => {
      const restaurants = await system.reads.listRestaurants();
      console.log(`\n🍽️  ${restaurants.length} restaurants\n`);
      if (restaurants.length > 0) {
        console.table(restaurants.map(r => ({ ID: r.id, Name: r.name, Owner: r.owner })));
      }
    });
  });

program
  .command('restaurant <restaurantId>')
  .description('Show a restaurant\'s menu, staff and active orders')
  .option('-u, --user <username>', 'Show permissions for this user')
  .action(async (restaurantId: string, options: { user?: string }) => {
    await cli.run(async system => {
      const id = DataValidator.parseId(restaurantId, 'restaurantId');
      const detail = await system.reads.getRestaurantDetail(id, options.user);
      if (!detail) {
        console.log(chalk.red(`❌ Restaurant ${id} does not exist`));
        process.exitCode = 1;
        return;
      }

      console.log(`\n🍽️  ${detail.name} (owner ${detail.owner})`);
      console.log(`Employees: ${detail.employees.join(', ') || 'none'}`);
      if (options.user) {
        console.log(`${options.user}: owner=${detail.viewer.isOwner} employee=${detail.viewer.isEmployee}`);
      }
      console.log('\nMenu:');
      console.table(detail.menu.map(item => ({ ID: item.id, Item: item.name, Price: formatCents(item.price) })));
      console.log('\nActive orders:');
      console.table(detail.activeOrders.map(order => ({
        ID: order.id,
        Customer: order.username,
        Address: order.address,
        Total: formatCents(order.total),
        Status: order.status
      })));
    });
  });

program
  .command('create-order <restaurantId>')
  .description('Open a new pending order')
  .requiredOption('-u, --user <username>', 'Customer username')
  .action(async (restaurantId: string, options: { user: string }) => {
    await cli.run(async system => {
      const result = await system.createOrder(DataValidator.parseId(restaurantId, 'restaurantId'), options.user);
      cli.report(result, orderId => `Order ${orderId} created`);
    });
  });

program
  .command('cart-add <orderId> <itemId> [count]')
  .description('Add items to a pending order')
  .action(async (orderId: string, itemId: string, count: string | undefined) => {
    await cli.run(async system => {
      const result = await system.modifyItemQuantity(
        DataValidator.parseId(orderId, 'orderId'),
        DataValidator.parseId(itemId, 'itemId'),
        DataValidator.parseId(count ?? '1', 'count')
      );
      cli.report(result, change => `Item ${change.itemId} quantity is now ${change.quantity}`);
    });
  });

program
  .command('cart-remove <orderId> <itemId> [count]')
  .description('Remove items from a pending order')
  .action(async (orderId: string, itemId: string, count: string | undefined) => {
    await cli.run(async system => {
      const result = await system.modifyItemQuantity(
        DataValidator.parseId(orderId, 'orderId'),
        DataValidator.parseId(itemId, 'itemId'),
        -DataValidator.parseId(count ?? '1', 'count')
      );
      cli.report(result, change => `Item ${change.itemId} quantity is now ${change.quantity}`);
    });
  });

program
  .command('transition <orderId> <status>')
  .description(`Move an order to ${ORDER_STATUSES.join('|')}`)
  .requiredOption('-u, --user <username>', 'Acting user')
  .option('-r, --restaurant <restaurantId>', 'Act for this restaurant (employee actions)')
  .action(async (orderId: string, status: string, options: TransitionOptions) => {
    await cli.run(async system => {
      const result = await system.transition(
        options.user,
        options.restaurant === undefined ? null : DataValidator.parseId(options.restaurant, 'restaurantId'),
        DataValidator.parseId(orderId, 'orderId'),
        cli.parseStatus(status)
      );
      if (cli.report(result, outcome => `Order ${outcome.orderId} ${outcome.from} -> ${outcome.to}`) && result.value.snapshot) {
        console.log(`   Charged ${formatCents(result.value.snapshot.total)} to ${result.value.snapshot.address}`);
      }
    });
  });

program
  .command('show-order <orderId>')
  .description('Show an order with its items')
  .action(async (orderId: string) => {
    await cli.run(async system => {
      const id = DataValidator.parseId(orderId, 'orderId');
      const order = await system.reads.getOrderDetail(id);
      if (!order) {
        console.log(chalk.red(`❌ Order ${id} does not exist`));
        process.exitCode = 1;
        return;
      }
      cli.printOrder(order);
    });
  });

program
  .command('orders <username>')
  .description('List a customer\'s orders')
  .action(async (username: string) => {
    await cli.run(async system => {
      const orders = await system.reads.getUserOrders(username);
      console.log(`\n📋 ${orders.length} orders for ${username}\n`);
      if (orders.length > 0) {
        console.table(orders.map(order => ({
          ID: order.id,
          Restaurant: order.restaurantName,
          Status: order.status,
          Total: order.status === 'PENDING' ? '-' : formatCents(order.total),
          Created: new Date(order.createdAt).toLocaleString()
        })));
      }
    });
  });

program.parseAsync(process.argv).catch((error: unknown) => {
  console.error('CLI failed:', error);
  process.exit(1);
});

export { RestaurantOrdersCLI };
